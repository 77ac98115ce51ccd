/**
 * Diff report envelope returned to operators: the patch, its summary lines
 * and the number of changes.
 *
 * @module @driftgate/core/diff
 */

import { diff } from './differ.js';
import type { Patch } from './patch.js';
import { summarize } from './summarize.js';
import type { ConfigTree } from './tree.js';

export interface DiffReport {
  patch: Patch;
  summary: string[];
  changes: number;
}

export function buildDiffReport(current: ConfigTree, desired: ConfigTree): DiffReport {
  const patch = diff(current, desired);
  return {
    patch,
    summary: summarize(patch),
    changes: patch.length,
  };
}
