/**
 * @driftgate/engine - Approval-gated enforcement decisions
 *
 * The Policy State Gate decides whether a patch produced by the differ may
 * proceed to application, based on an explicit enforcement flag and a fresh
 * approval lookup.
 *
 * @module @driftgate/engine
 */

export * from './gate/index.js';
