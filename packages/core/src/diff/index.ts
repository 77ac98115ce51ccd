/**
 * Desired-state diff engine
 *
 * @module @driftgate/core/diff
 */

export type { ConfigTree, ConfigMapping, TreeKind, TaggedTree } from './tree.js';
export {
  ConfigTreeSchema,
  classify,
  kindOf,
  sortedKeys,
  treesEqual,
  parseConfigTree,
  toValidationIssues,
} from './tree.js';

export { ROOT_PATH, escapeSegment, unescapeSegment, encodePath, decodePath } from './path.js';

export type {
  PatchOp,
  PatchOperation,
  AddOperation,
  RemoveOperation,
  ReplaceOperation,
  Patch,
} from './patch.js';
export { addOp, removeOp, replaceOp, PatchOperationSchema, PatchSchema, parsePatch } from './patch.js';

export { diff } from './differ.js';
export { summarize } from './summarize.js';
export type { DiffReport } from './report.js';
export { buildDiffReport } from './report.js';
