/**
 * Tree Differ
 *
 * Computes the structural diff between a current and a desired tree.
 *
 * Rules, applied at every node:
 * - different kinds: one `replace` carrying the whole desired subtree
 * - two mappings: `remove` keys only in current, `add` keys only in desired,
 *   recurse into shared keys
 * - two sequences: atomic, a single `replace` of the whole sequence when they
 *   differ (no positional insert/remove/move operations)
 * - two scalars of the same kind: `replace` when the values differ
 *
 * Mapping keys are visited in sorted order, so equal inputs always produce
 * identical patches whatever the insertion order of their keys.
 *
 * @module @driftgate/core/diff
 */

import { addOp, removeOp, replaceOp, type Patch, type PatchOperation } from './patch.js';
import { encodePath } from './path.js';
import { classify, sortedKeys, treesEqual, type ConfigMapping, type ConfigTree } from './tree.js';

/**
 * Diff two trees into an ordered patch
 */
export function diff(current: ConfigTree, desired: ConfigTree): Patch {
  const patch: PatchOperation[] = [];
  diffNode(current, desired, [], patch);
  return patch;
}

function diffNode(current: ConfigTree, desired: ConfigTree, segments: string[], patch: PatchOperation[]): void {
  const left = classify(current);
  const right = classify(desired);

  if (left.kind !== right.kind) {
    patch.push(replaceOp(encodePath(segments), desired));
    return;
  }

  if (left.kind === 'mapping' && right.kind === 'mapping') {
    diffMappings(left.value, right.value, segments, patch);
    return;
  }

  if (left.kind === 'sequence' && right.kind === 'sequence') {
    if (!treesEqual(left.value, right.value)) {
      patch.push(replaceOp(encodePath(segments), desired));
    }
    return;
  }

  if (left.value !== right.value) {
    patch.push(replaceOp(encodePath(segments), desired));
  }
}

function diffMappings(
  current: ConfigMapping,
  desired: ConfigMapping,
  segments: string[],
  patch: PatchOperation[]
): void {
  for (const key of sortedKeys(current)) {
    if (!Object.hasOwn(desired, key)) {
      patch.push(removeOp(encodePath([...segments, key])));
    }
  }

  for (const key of sortedKeys(desired)) {
    if (!Object.hasOwn(current, key)) {
      patch.push(addOp(encodePath([...segments, key]), desired[key]));
    } else {
      diffNode(current[key], desired[key], [...segments, key], patch);
    }
  }
}
