/**
 * Config Tree Model
 *
 * Generic tree-shaped values the differ operates on. The differ imposes no
 * schema; a tree is anything JSON can represent.
 *
 * @module @driftgate/core/diff
 */

import { z } from 'zod';
import { ValidationError, type ValidationIssue } from '../errors/index.js';
import { encodePath } from './path.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Mapping of string keys to subtrees. Enumeration order carries no meaning.
 */
export interface ConfigMapping {
  [key: string]: ConfigTree;
}

/**
 * A generic tree value
 */
export type ConfigTree = null | boolean | number | string | ConfigTree[] | ConfigMapping;

/**
 * Structural kind of a tree node
 */
export type TreeKind = 'null' | 'boolean' | 'number' | 'string' | 'sequence' | 'mapping';

/**
 * A tree node paired with its kind tag, so callers can dispatch on `kind`
 * and get the value narrowed to match.
 */
export type TaggedTree =
  | { kind: 'null'; value: null }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'number'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'sequence'; value: ConfigTree[] }
  | { kind: 'mapping'; value: ConfigMapping };

// =============================================================================
// Classification
// =============================================================================

/**
 * Attach the kind tag to a tree node
 */
export function classify(tree: ConfigTree): TaggedTree {
  if (tree === null) {
    return { kind: 'null', value: tree };
  }
  if (Array.isArray(tree)) {
    return { kind: 'sequence', value: tree };
  }
  if (typeof tree === 'boolean') {
    return { kind: 'boolean', value: tree };
  }
  if (typeof tree === 'number') {
    return { kind: 'number', value: tree };
  }
  if (typeof tree === 'string') {
    return { kind: 'string', value: tree };
  }
  return { kind: 'mapping', value: tree };
}

/**
 * Kind tag of a tree node
 */
export function kindOf(tree: ConfigTree): TreeKind {
  return classify(tree).kind;
}

/**
 * Mapping keys in traversal order (UTF-16 code unit order)
 */
export function sortedKeys(mapping: ConfigMapping): string[] {
  return Object.keys(mapping).sort();
}

/**
 * Deep structural equality. Mapping key order is ignored; sequence order is not.
 */
export function treesEqual(a: ConfigTree, b: ConfigTree): boolean {
  const left = classify(a);
  const right = classify(b);

  if (left.kind === 'mapping' && right.kind === 'mapping') {
    const keys = sortedKeys(left.value);
    const otherKeys = sortedKeys(right.value);
    if (keys.length !== otherKeys.length) {
      return false;
    }
    return keys.every((key, i) => key === otherKeys[i] && treesEqual(left.value[key], right.value[key]));
  }

  if (left.kind === 'sequence' && right.kind === 'sequence') {
    return (
      left.value.length === right.value.length &&
      left.value.every((item, i) => treesEqual(item, right.value[i]))
    );
  }

  return left.kind === right.kind && left.value === right.value;
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Zod schema accepting exactly the values a ConfigTree can hold
 */
export const ConfigTreeSchema: z.ZodType<ConfigTree> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number().finite(),
    z.string(),
    z.array(ConfigTreeSchema),
    z.record(ConfigTreeSchema),
  ])
);

/**
 * Convert zod issues into encoded-path validation issues
 */
export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.errors.map((issue) => ({
    path: encodePath(issue.path.map(String)),
    message: issue.message,
  }));
}

/**
 * Mapping keys that cannot survive parsing as own data properties
 */
export const RESERVED_KEYS: ReadonlySet<string> = new Set(['__proto__']);

/**
 * Locate reserved keys anywhere in a raw parsed value
 */
export function findReservedKeys(input: unknown, segments: readonly string[] = []): ValidationIssue[] {
  if (Array.isArray(input)) {
    return input.flatMap((item: unknown, i) => findReservedKeys(item, [...segments, String(i)]));
  }
  if (typeof input !== 'object' || input === null) {
    return [];
  }
  return Object.entries(input).flatMap(([key, value]: [string, unknown]) => {
    const path = [...segments, key];
    if (RESERVED_KEYS.has(key)) {
      return [{ path: encodePath(path), message: `Reserved key '${key}'` }];
    }
    return findReservedKeys(value, path);
  });
}

/**
 * Validate a value arriving from outside the process as a ConfigTree.
 *
 * @throws {ValidationError} when the value is not JSON-representable or
 *   holds a reserved key
 */
export function parseConfigTree(input: unknown, label = 'tree'): ConfigTree {
  const result = ConfigTreeSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(`Invalid ${label}: not a JSON-representable value`, toValidationIssues(result.error));
  }
  const reserved = findReservedKeys(input);
  if (reserved.length > 0) {
    throw new ValidationError(`Invalid ${label}: reserved key`, reserved);
  }
  return result.data;
}
