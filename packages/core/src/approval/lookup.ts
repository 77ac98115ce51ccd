/**
 * Approval Lookup Contract
 *
 * The gate's only external collaborator: fetch the current approval status
 * for an external reference (e.g. a ticket key). Implementations return an
 * explicit result instead of throwing, so a failed fetch reaches the gate's
 * fail-closed branch through typed control flow.
 *
 * @module @driftgate/core/approval
 */

import { LookupError, type LookupFailureReason } from '../errors/index.js';

/**
 * Opaque external identifier, e.g. a ticket key
 */
export type ApprovalReference = string;

/**
 * Approval status as reported by the external workflow system
 */
export interface ApprovalState {
  status: string;
}

export type ApprovalLookupResult =
  | { ok: true; approval: ApprovalState }
  | { ok: false; error: LookupError };

export interface ApprovalLookupOptions {
  /** Aborts the single outstanding request */
  signal?: AbortSignal;
}

export interface ApprovalLookup {
  getApproval(reference: ApprovalReference, options?: ApprovalLookupOptions): Promise<ApprovalLookupResult>;
}

export function approvalFound(status: string): ApprovalLookupResult {
  return { ok: true, approval: { status } };
}

export function approvalFailed(message: string, reason: LookupFailureReason, context?: Record<string, unknown>): ApprovalLookupResult {
  return { ok: false, error: new LookupError(message, reason, context) };
}

/**
 * Lookup used when no workflow system is configured. Every call fails, so a
 * gate wired to it can only block.
 */
export class UnconfiguredApprovalLookup implements ApprovalLookup {
  async getApproval(reference: ApprovalReference): Promise<ApprovalLookupResult> {
    return approvalFailed(`no approval source configured for '${reference}'`, 'not_configured');
  }
}
