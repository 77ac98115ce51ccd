/**
 * Patch path encoding.
 *
 * Segments are escaped (`~` → `~0`, `/` → `~1`) and joined with `/` behind
 * a leading `/`. The root path is `/`.
 *
 * @module @driftgate/core/diff
 */

import { ValidationError } from '../errors/index.js';

export const ROOT_PATH = '/';

export function escapeSegment(segment: string): string {
  return segment.replace(/~/g, '~0').replace(/\//g, '~1');
}

export function unescapeSegment(segment: string): string {
  return segment.replace(/~1/g, '/').replace(/~0/g, '~');
}

/**
 * Encode an ordered list of segments as a path string
 */
export function encodePath(segments: readonly string[]): string {
  return ROOT_PATH + segments.map(escapeSegment).join('/');
}

/**
 * Decode a path string back into its segments.
 *
 * `/` decodes to the root (no segments); a single empty key at the root
 * encodes to the same string and cannot be told apart from it.
 *
 * @throws {ValidationError} when the path does not start with `/`
 */
export function decodePath(path: string): string[] {
  if (!path.startsWith(ROOT_PATH)) {
    throw new ValidationError(`Invalid path '${path}': must start with '/'`, [
      { path, message: "must start with '/'" },
    ]);
  }
  if (path === ROOT_PATH) {
    return [];
  }
  return path.slice(1).split('/').map(unescapeSegment);
}
