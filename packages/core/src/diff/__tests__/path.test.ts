import { describe, it, expect } from 'vitest';
import { decodePath, encodePath, escapeSegment, unescapeSegment } from '../path.js';
import { ValidationError } from '../../errors/index.js';

describe('path encoding', () => {
  it('should encode the root as a single slash', () => {
    expect(encodePath([])).toBe('/');
  });

  it('should join segments behind a leading slash', () => {
    expect(encodePath(['a', 'b'])).toBe('/a/b');
  });

  it('should escape ~ before /', () => {
    expect(escapeSegment('a/b')).toBe('a~1b');
    expect(escapeSegment('~x')).toBe('~0x');
    expect(escapeSegment('~1')).toBe('~01');
    expect(encodePath(['a/b', '~x'])).toBe('/a~1b/~0x');
  });

  it('should unescape in the reverse order', () => {
    expect(unescapeSegment('~01')).toBe('~1');
    expect(unescapeSegment('a~1b')).toBe('a/b');
  });

  it('should decode what it encodes', () => {
    const segments = ['rules', 'a/b', '~1', 'plain'];
    expect(decodePath(encodePath(segments))).toEqual(segments);
  });

  it('should decode the root to no segments', () => {
    expect(decodePath('/')).toEqual([]);
  });

  it('should reject a path without a leading slash', () => {
    expect(() => decodePath('a/b')).toThrow(ValidationError);
  });
});
