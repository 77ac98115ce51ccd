/**
 * Policy State Gate Types
 *
 * @module @driftgate/engine/gate
 */

import type { ApprovalLookup, ApprovalReference, IMetrics, Logger, Patch } from '@driftgate/core';

// =============================================================================
// State Machine
// =============================================================================

/**
 * Gate states. Every call starts in INIT and ends in exactly one terminal
 * state:
 *
 *   INIT ──(enforcement disabled)──────────────────────▶ BLOCKED
 *   INIT ──▶ FETCHING_APPROVAL ──(failure | not allowed)──▶ BLOCKED
 *                              └─(status in allowlist)───▶ ACCEPTED
 */
export type GateState = 'INIT' | 'FETCHING_APPROVAL' | 'BLOCKED' | 'ACCEPTED';

export type TerminalGateState = Extract<GateState, 'BLOCKED' | 'ACCEPTED'>;

// =============================================================================
// Request / Decision
// =============================================================================

export interface EnforceRequest {
  /** Patch the caller wants authorized */
  patch: Patch;

  /** External approval reference, e.g. a ticket key */
  approvalRef: ApprovalReference;

  /** Statuses that authorize the patch; matched exactly and case-sensitively */
  allowedStatuses: ReadonlySet<string> | readonly string[];

  /** Explicit enforcement flag; false always blocks */
  enforcementEnabled: boolean;

  /** Caller-imposed timeout or cancellation for the approval lookup */
  signal?: AbortSignal;
}

export type EnforcementOutcome = 'accepted' | 'blocked';

export interface EnforcementDecision {
  outcome: EnforcementOutcome;
  reason: string;
  /** Patch length when accepted, 0 when blocked */
  appliedOpsCount: number;
}

// =============================================================================
// Configuration
// =============================================================================

export interface PolicyStateGateOptions {
  lookup: ApprovalLookup;
  /** Defaults to the process-wide metrics */
  metrics?: IMetrics;
  logger?: Logger;
}

/**
 * Gate settings read from the environment by the CLI
 */
export interface GateConfig {
  enforcementEnabled: boolean;
  allowedStatuses: string[];
  lookupTimeoutMs: number;
}
