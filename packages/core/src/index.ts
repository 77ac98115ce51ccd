/**
 * @driftgate/core - Desired-state diff engine and shared primitives
 *
 * - Diff: tree model, differ, summarizer, patch validation
 * - Approval: lookup contract consumed by the enforcement gate
 * - Errors, logging and metrics shared by every package
 */

export * from './diff/index.js';
export * from './approval/index.js';
export * from './errors/index.js';
export * from './telemetry/index.js';
export * from './metrics/index.js';
