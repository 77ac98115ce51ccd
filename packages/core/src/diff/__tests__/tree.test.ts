import { describe, it, expect } from 'vitest';
import { classify, kindOf, parseConfigTree, treesEqual } from '../tree.js';
import { ValidationError } from '../../errors/index.js';

describe('kindOf', () => {
  it('should tag every kind', () => {
    expect(kindOf(null)).toBe('null');
    expect(kindOf(false)).toBe('boolean');
    expect(kindOf(0)).toBe('number');
    expect(kindOf('')).toBe('string');
    expect(kindOf([])).toBe('sequence');
    expect(kindOf({})).toBe('mapping');
  });

  it('should pair the tag with the value', () => {
    expect(classify({ a: 1 })).toEqual({ kind: 'mapping', value: { a: 1 } });
  });
});

describe('treesEqual', () => {
  it('should ignore mapping key order', () => {
    expect(treesEqual({ a: 1, b: [1, { c: 2, d: 3 }] }, { b: [1, { d: 3, c: 2 }], a: 1 })).toBe(true);
  });

  it('should respect sequence order and length', () => {
    expect(treesEqual([1, 2], [2, 1])).toBe(false);
    expect(treesEqual([1, 2], [1, 2, 3])).toBe(false);
  });

  it('should distinguish kinds with loosely equal values', () => {
    expect(treesEqual(0, false)).toBe(false);
    expect(treesEqual('1', 1)).toBe(false);
    expect(treesEqual([], {})).toBe(false);
  });

  it('should distinguish mappings with different keys of equal count', () => {
    expect(treesEqual({ a: 1 }, { b: 1 })).toBe(false);
  });
});

describe('parseConfigTree', () => {
  it('should accept JSON values', () => {
    const input: unknown = JSON.parse('{"a":[1,"two",null,{"b":true}]}');
    expect(parseConfigTree(input)).toEqual({ a: [1, 'two', null, { b: true }] });
  });

  it('should reject values JSON cannot represent', () => {
    expect(() => parseConfigTree(undefined)).toThrow(ValidationError);
    expect(() => parseConfigTree({ a: Number.NaN })).toThrow(ValidationError);
    expect(() => parseConfigTree([Number.POSITIVE_INFINITY])).toThrow(ValidationError);
    expect(() => parseConfigTree({ at: new Date(0) })).toThrow(ValidationError);
    expect(() => parseConfigTree(() => 1)).toThrow(ValidationError);
  });

  it('should reject a __proto__ key instead of dropping it', () => {
    const input: unknown = JSON.parse('{"a":{"__proto__":{"x":1},"b":1}}');
    let caught: unknown;

    try {
      parseConfigTree(input, 'desired state');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      message: 'Invalid desired state: reserved key',
      issues: [{ path: '/a/__proto__', message: "Reserved key '__proto__'" }],
    });
  });

  it('should keep keys that merely look special', () => {
    const input: unknown = JSON.parse('{"prototype":{"toString":2}}');
    expect(parseConfigTree(input)).toEqual({ prototype: { toString: 2 } });
  });

  it('should name the rejected input in the message', () => {
    expect(() => parseConfigTree(undefined, 'desired state')).toThrow(
      'Invalid desired state: not a JSON-representable value'
    );
  });
});
