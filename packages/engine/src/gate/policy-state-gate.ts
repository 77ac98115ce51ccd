/**
 * Policy State Gate
 *
 * Decides whether a patch may proceed to application. Combines the explicit
 * enforcement flag, a single fresh approval lookup and an exact-match
 * allowlist into an accepted/blocked decision.
 *
 * Fail-closed: a disabled flag, any lookup failure (including timeouts and
 * aborts), a status outside the allowlist, or any unexpected error while
 * deciding all end in BLOCKED. Errors never propagate to the caller.
 *
 * Accepting performs no mutation; it only authorizes a separate,
 * provider-specific application step.
 *
 * @module @driftgate/engine/gate
 */

import {
  LookupError,
  METRIC_NAMES,
  getLogger,
  getMetrics,
  toLookupError,
  type ApprovalLookup,
  type ApprovalLookupResult,
  type IMetrics,
  type Logger,
} from '@driftgate/core';
import type {
  EnforceRequest,
  EnforcementDecision,
  GateState,
  PolicyStateGateOptions,
  TerminalGateState,
} from './types.js';

export const ENFORCEMENT_DISABLED_REASON = 'enforcement disabled';

export class PolicyStateGate {
  private readonly lookup: ApprovalLookup;
  private readonly metrics: IMetrics;
  private readonly logger: Logger;

  constructor(options: PolicyStateGateOptions) {
    this.lookup = options.lookup;
    this.metrics = options.metrics ?? getMetrics();
    this.logger = options.logger ?? getLogger('policy-state-gate');
  }

  /**
   * Run one enforcement decision. Never rejects.
   */
  async enforce(request: EnforceRequest): Promise<EnforcementDecision> {
    this.metrics.increment(METRIC_NAMES.enforceAttempts);

    const log = this.logger.child({ approvalRef: request.approvalRef });
    let state: GateState = 'INIT';
    const moveTo = (next: GateState): void => {
      log.debug('Gate transition', { from: state, to: next });
      state = next;
    };

    let decision: EnforcementDecision;
    try {
      decision = await this.decide(request, moveTo);
    } catch (error) {
      log.error('Unexpected error while deciding, blocking', error);
      decision = blocked(`internal error: ${error instanceof Error ? error.message : String(error)}`);
    }

    const terminal: TerminalGateState = decision.outcome === 'accepted' ? 'ACCEPTED' : 'BLOCKED';
    moveTo(terminal);

    this.metrics.increment(
      decision.outcome === 'accepted' ? METRIC_NAMES.enforceAccepted : METRIC_NAMES.enforceBlocked
    );

    log.info('Enforcement decision', {
      outcome: decision.outcome,
      reason: decision.reason,
      appliedOpsCount: decision.appliedOpsCount,
      patchOps: request.patch.length,
    });

    return decision;
  }

  private async decide(request: EnforceRequest, moveTo: (next: GateState) => void): Promise<EnforcementDecision> {
    if (request.enforcementEnabled !== true) {
      return blocked(ENFORCEMENT_DISABLED_REASON);
    }

    moveTo('FETCHING_APPROVAL');
    const result = await this.fetchApproval(request);

    if (!result.ok) {
      return blocked(`approval lookup failed: ${result.error.message}`);
    }

    const status = result.approval.status;
    const allowed = [...request.allowedStatuses];

    if (!allowed.includes(status)) {
      return blocked(`approval status '${status}' not in allowlist ${JSON.stringify(allowed)}`);
    }

    return {
      outcome: 'accepted',
      reason: `approval status '${status}' is in allowlist`,
      appliedOpsCount: request.patch.length,
    };
  }

  /**
   * Exactly one lookup call. Thrown errors and caller aborts become failed
   * results; a lookup that ignores the signal is abandoned once it fires.
   */
  private async fetchApproval(request: EnforceRequest): Promise<ApprovalLookupResult> {
    const { signal } = request;
    try {
      if (signal?.aborted) {
        return { ok: false, error: abortError(signal) };
      }
      const pending = this.lookup.getApproval(request.approvalRef, { signal });
      const result = signal ? await raceAbort(pending, signal) : await pending;
      if (!isLookupResult(result)) {
        return { ok: false, error: new LookupError('lookup returned an unrecognized result', 'malformed_response') };
      }
      return result;
    } catch (error) {
      return { ok: false, error: toLookupError(error) };
    }
  }
}

function blocked(reason: string): EnforcementDecision {
  return { outcome: 'blocked', reason, appliedOpsCount: 0 };
}

function isTimeoutReason(reason: unknown): boolean {
  return typeof reason === 'object' && reason !== null && 'name' in reason && reason.name === 'TimeoutError';
}

function abortError(signal: AbortSignal): LookupError {
  const reason: unknown = signal.reason;
  return isTimeoutReason(reason)
    ? new LookupError('approval lookup timed out', 'timeout')
    : new LookupError('approval lookup aborted', 'aborted');
}

function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(abortError(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    void work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Shape check for results coming from untyped lookups
 */
function isLookupResult(value: unknown): value is ApprovalLookupResult {
  if (typeof value !== 'object' || value === null || !('ok' in value)) {
    return false;
  }
  if (value.ok === true) {
    return (
      'approval' in value &&
      typeof value.approval === 'object' &&
      value.approval !== null &&
      'status' in value.approval &&
      typeof value.approval.status === 'string'
    );
  }
  return value.ok === false && 'error' in value && value.error instanceof LookupError;
}
