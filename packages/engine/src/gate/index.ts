/**
 * Approval-gated enforcement
 *
 * @module @driftgate/engine/gate
 */

export type {
  GateState,
  TerminalGateState,
  EnforceRequest,
  EnforcementOutcome,
  EnforcementDecision,
  PolicyStateGateOptions,
  GateConfig,
} from './types.js';

export { PolicyStateGate, ENFORCEMENT_DISABLED_REASON } from './policy-state-gate.js';

export {
  DEFAULT_ALLOWED_STATUSES,
  DEFAULT_GATE_CONFIG,
  parseStatusList,
  readGateConfigFromEnv,
} from './config.js';
