/**
 * Patch Types
 *
 * A patch is the ordered list of add/remove/replace operations that turns a
 * current tree into a desired one. Order follows the differ's traversal.
 *
 * @module @driftgate/core/diff
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import { ConfigTreeSchema, findReservedKeys, toValidationIssues, type ConfigTree } from './tree.js';
import { ROOT_PATH } from './path.js';

// =============================================================================
// Types
// =============================================================================

export type PatchOp = 'add' | 'remove' | 'replace';

export interface AddOperation {
  readonly op: 'add';
  readonly path: string;
  readonly value: ConfigTree;
}

export interface RemoveOperation {
  readonly op: 'remove';
  readonly path: string;
}

export interface ReplaceOperation {
  readonly op: 'replace';
  readonly path: string;
  readonly value: ConfigTree;
}

/**
 * A single self-contained change
 */
export type PatchOperation = AddOperation | RemoveOperation | ReplaceOperation;

export type Patch = readonly PatchOperation[];

// =============================================================================
// Construction
// =============================================================================

export function addOp(path: string, value: ConfigTree): AddOperation {
  const operation: AddOperation = { op: 'add', path, value };
  return Object.freeze(operation);
}

export function removeOp(path: string): RemoveOperation {
  const operation: RemoveOperation = { op: 'remove', path };
  return Object.freeze(operation);
}

export function replaceOp(path: string, value: ConfigTree): ReplaceOperation {
  const operation: ReplaceOperation = { op: 'replace', path, value };
  return Object.freeze(operation);
}

// =============================================================================
// Validation
// =============================================================================

const PathSchema = z.string().startsWith(ROOT_PATH, { message: "Path must start with '/'" });

export const PatchOperationSchema = z.discriminatedUnion('op', [
  z.object({ op: z.literal('add'), path: PathSchema, value: ConfigTreeSchema }).strict(),
  z.object({ op: z.literal('remove'), path: PathSchema }).strict(),
  z.object({ op: z.literal('replace'), path: PathSchema, value: ConfigTreeSchema }).strict(),
]);

export const PatchSchema = z.array(PatchOperationSchema);

/**
 * Validate a patch read from outside the process.
 *
 * @throws {ValidationError} on an unknown op, a missing or unexpected value,
 *   a path that does not start with `/`, or a reserved key in a value
 */
export function parsePatch(input: unknown): Patch {
  const result = PatchSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Invalid patch', toValidationIssues(result.error));
  }
  const reserved = findReservedKeys(input);
  if (reserved.length > 0) {
    throw new ValidationError('Invalid patch', reserved);
  }
  return result.data.map((operation): PatchOperation => {
    switch (operation.op) {
      case 'add':
        return addOp(operation.path, operation.value);
      case 'remove':
        return removeOp(operation.path);
      case 'replace':
        return replaceOp(operation.path, operation.value);
    }
  });
}
