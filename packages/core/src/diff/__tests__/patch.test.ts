import { describe, it, expect } from 'vitest';
import { parsePatch } from '../patch.js';
import { ValidationError } from '../../errors/index.js';

function captureValidationError(input: unknown): ValidationError {
  try {
    parsePatch(input);
  } catch (error) {
    if (error instanceof ValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected parsePatch to throw');
}

describe('parsePatch', () => {
  it('should accept a well-formed patch', () => {
    const patch = parsePatch(
      JSON.parse('[{"op":"add","path":"/a","value":{"x":[1]}},{"op":"remove","path":"/b"},{"op":"replace","path":"/","value":null}]')
    );

    expect(patch).toEqual([
      { op: 'add', path: '/a', value: { x: [1] } },
      { op: 'remove', path: '/b' },
      { op: 'replace', path: '/', value: null },
    ]);
    expect(patch.every((operation) => Object.isFrozen(operation))).toBe(true);
  });

  it('should reject an unknown op', () => {
    const error = captureValidationError([{ op: 'move', path: '/a' }]);

    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.message).toBe('Invalid patch');
    expect(error.issues[0].path).toBe('/0/op');
  });

  it('should reject add without a value', () => {
    const error = captureValidationError([{ op: 'remove', path: '/a' }, { op: 'add', path: '/b' }]);

    expect(error.issues[0].path).toBe('/1/value');
  });

  it('should reject remove carrying a value', () => {
    expect(() => parsePatch([{ op: 'remove', path: '/a', value: 1 }])).toThrow(ValidationError);
  });

  it('should reject a path without a leading slash', () => {
    expect(() => parsePatch([{ op: 'replace', path: 'a', value: 1 }])).toThrow(ValidationError);
  });

  it('should reject a __proto__ key inside a value', () => {
    const error = captureValidationError(JSON.parse('[{"op":"add","path":"/a","value":{"__proto__":{"x":1}}}]'));

    expect(error.message).toBe('Invalid patch');
    expect(error.issues).toEqual([{ path: '/0/value/__proto__', message: "Reserved key '__proto__'" }]);
  });

  it('should reject a non-array', () => {
    expect(() => parsePatch({ op: 'add', path: '/a', value: 1 })).toThrow(ValidationError);
  });
});
