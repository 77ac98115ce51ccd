/**
 * Patch Summarizer
 *
 * @module @driftgate/core/diff
 */

import type { Patch } from './patch.js';

/**
 * Render a patch as one `OP /path` line per operation
 */
export function summarize(patch: Patch): string[] {
  return patch.map((operation) => `${operation.op.toUpperCase()} ${operation.path}`);
}
