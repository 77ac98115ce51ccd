/**
 * Policy State Gate Tests
 *
 * @module @driftgate/engine/gate
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  Logger,
  LookupError,
  METRIC_NAMES,
  PrometheusMetrics,
  addOp,
  approvalFailed,
  approvalFound,
  removeOp,
  replaceOp,
  type ApprovalLookup,
  type ApprovalLookupOptions,
  type ApprovalLookupResult,
  type Patch,
} from '@driftgate/core';
import { PolicyStateGate, ENFORCEMENT_DISABLED_REASON } from '../index.js';

// =============================================================================
// Test Helpers
// =============================================================================

class StubLookup implements ApprovalLookup {
  calls: string[] = [];
  lastSignal: AbortSignal | undefined;

  constructor(private readonly respond: () => Promise<ApprovalLookupResult>) {}

  getApproval(reference: string, options?: ApprovalLookupOptions): Promise<ApprovalLookupResult> {
    this.calls.push(reference);
    this.lastSignal = options?.signal;
    return this.respond();
  }
}

const silentLogger = new Logger('policy-state-gate-test', {}, () => {});

const threeOps: Patch = [addOp('/a', 1), removeOp('/b'), replaceOp('/c/x', 'on')];

function statusLookup(status: string): StubLookup {
  return new StubLookup(async () => approvalFound(status));
}

describe('PolicyStateGate', () => {
  let metrics: PrometheusMetrics;

  beforeEach(() => {
    metrics = new PrometheusMetrics();
  });

  function gateWith(lookup: ApprovalLookup): PolicyStateGate {
    return new PolicyStateGate({ lookup, metrics, logger: silentLogger });
  }

  // ===========================================================================
  // Acceptance
  // ===========================================================================

  describe('accepted decisions', () => {
    it('should accept when the status is in the allowlist', async () => {
      const lookup = statusLookup('Approved');

      const decision = await gateWith(lookup).enforce({
        patch: threeOps,
        approvalRef: 'TICK-1',
        allowedStatuses: new Set(['Approved']),
        enforcementEnabled: true,
      });

      expect(decision).toEqual({
        outcome: 'accepted',
        reason: "approval status 'Approved' is in allowlist",
        appliedOpsCount: 3,
      });
      expect(lookup.calls).toEqual(['TICK-1']);
    });

    it('should accept an allowlist given as an array', async () => {
      const decision = await gateWith(statusLookup('Ready for Change')).enforce({
        patch: threeOps,
        approvalRef: 'TICK-2',
        allowedStatuses: ['Approved', 'Ready for Change'],
        enforcementEnabled: true,
      });

      expect(decision.outcome).toBe('accepted');
      expect(decision.appliedOpsCount).toBe(3);
    });

    it('should accept an empty patch with zero applied ops', async () => {
      const decision = await gateWith(statusLookup('Approved')).enforce({
        patch: [],
        approvalRef: 'TICK-3',
        allowedStatuses: ['Approved'],
        enforcementEnabled: true,
      });

      expect(decision).toEqual({
        outcome: 'accepted',
        reason: "approval status 'Approved' is in allowlist",
        appliedOpsCount: 0,
      });
    });
  });

  // ===========================================================================
  // Enforcement flag
  // ===========================================================================

  describe('enforcement disabled', () => {
    it('should block without looking up the approval', async () => {
      const lookup = statusLookup('Approved');

      const decision = await gateWith(lookup).enforce({
        patch: threeOps,
        approvalRef: 'TICK-1',
        allowedStatuses: new Set(['Approved']),
        enforcementEnabled: false,
      });

      expect(decision).toEqual({
        outcome: 'blocked',
        reason: 'enforcement disabled',
        appliedOpsCount: 0,
      });
      expect(ENFORCEMENT_DISABLED_REASON).toBe('enforcement disabled');
      expect(lookup.calls).toEqual([]);
    });
  });

  // ===========================================================================
  // Allowlist
  // ===========================================================================

  describe('allowlist membership', () => {
    it('should block a status outside the allowlist and name it', async () => {
      const decision = await gateWith(statusLookup('In Review')).enforce({
        patch: threeOps,
        approvalRef: 'TICK-1',
        allowedStatuses: new Set(['Approved']),
        enforcementEnabled: true,
      });

      expect(decision).toEqual({
        outcome: 'blocked',
        reason: `approval status 'In Review' not in allowlist ["Approved"]`,
        appliedOpsCount: 0,
      });
    });

    it('should treat a status differing only in case as not allowed', async () => {
      const decision = await gateWith(statusLookup('approved')).enforce({
        patch: threeOps,
        approvalRef: 'TICK-1',
        allowedStatuses: new Set(['Approved']),
        enforcementEnabled: true,
      });

      expect(decision.outcome).toBe('blocked');
      expect(decision.reason).toBe(`approval status 'approved' not in allowlist ["Approved"]`);
    });

    it('should block everything when the allowlist is empty', async () => {
      const decision = await gateWith(statusLookup('Approved')).enforce({
        patch: threeOps,
        approvalRef: 'TICK-1',
        allowedStatuses: [],
        enforcementEnabled: true,
      });

      expect(decision.reason).toBe(`approval status 'Approved' not in allowlist []`);
    });
  });

  // ===========================================================================
  // Lookup failures
  // ===========================================================================

  describe('lookup failures', () => {
    it('should block on a failed lookup result and surface the failure', async () => {
      const lookup = new StubLookup(async () => approvalFailed('request failed with status 503', 'transport'));

      const decision = await gateWith(lookup).enforce({
        patch: threeOps,
        approvalRef: 'TICK-1',
        allowedStatuses: ['Approved'],
        enforcementEnabled: true,
      });

      expect(decision).toEqual({
        outcome: 'blocked',
        reason: 'approval lookup failed: request failed with status 503',
        appliedOpsCount: 0,
      });
    });

    it('should block when the lookup rejects', async () => {
      const lookup = new StubLookup(async () => {
        throw new Error('socket hang up');
      });

      const decision = await gateWith(lookup).enforce({
        patch: threeOps,
        approvalRef: 'TICK-1',
        allowedStatuses: ['Approved'],
        enforcementEnabled: true,
      });

      expect(decision.outcome).toBe('blocked');
      expect(decision.reason).toBe('approval lookup failed: socket hang up');
    });

    it('should block when the lookup throws synchronously', async () => {
      const lookup: ApprovalLookup = {
        getApproval() {
          throw new LookupError('credentials rejected', 'authorization');
        },
      };

      const decision = await gateWith(lookup).enforce({
        patch: threeOps,
        approvalRef: 'TICK-1',
        allowedStatuses: ['Approved'],
        enforcementEnabled: true,
      });

      expect(decision.reason).toBe('approval lookup failed: credentials rejected');
    });

    it('should block on a result with an unexpected shape', async () => {
      const lookup: ApprovalLookup = {
        getApproval: async () => JSON.parse('{"ok":true,"approval":{}}'),
      };

      const decision = await gateWith(lookup).enforce({
        patch: threeOps,
        approvalRef: 'TICK-1',
        allowedStatuses: ['Approved'],
        enforcementEnabled: true,
      });

      expect(decision.reason).toBe('approval lookup failed: lookup returned an unrecognized result');
    });

    it('should block without calling the lookup when already aborted', async () => {
      const lookup = statusLookup('Approved');
      const controller = new AbortController();
      controller.abort();

      const decision = await gateWith(lookup).enforce({
        patch: threeOps,
        approvalRef: 'TICK-1',
        allowedStatuses: ['Approved'],
        enforcementEnabled: true,
        signal: controller.signal,
      });

      expect(decision.reason).toBe('approval lookup failed: approval lookup aborted');
      expect(lookup.calls).toEqual([]);
    });

    it('should block when the caller timeout fires before the lookup settles', async () => {
      const lookup = new StubLookup(() => new Promise<ApprovalLookupResult>(() => {}));

      const decision = await gateWith(lookup).enforce({
        patch: threeOps,
        approvalRef: 'TICK-1',
        allowedStatuses: ['Approved'],
        enforcementEnabled: true,
        signal: AbortSignal.timeout(20),
      });

      expect(decision).toEqual({
        outcome: 'blocked',
        reason: 'approval lookup failed: approval lookup timed out',
        appliedOpsCount: 0,
      });
      expect(lookup.calls).toEqual(['TICK-1']);
    });

    it('should pass the caller signal to the lookup', async () => {
      const lookup = statusLookup('Approved');
      const controller = new AbortController();

      await gateWith(lookup).enforce({
        patch: threeOps,
        approvalRef: 'TICK-1',
        allowedStatuses: ['Approved'],
        enforcementEnabled: true,
        signal: controller.signal,
      });

      expect(lookup.lastSignal).toBe(controller.signal);
    });
  });

  // ===========================================================================
  // Counters
  // ===========================================================================

  describe('counters', () => {
    it('should count every attempt and exactly one outcome per call', async () => {
      const gate = gateWith(statusLookup('Approved'));
      const failing = gateWith(new StubLookup(async () => approvalFailed('timeout of 30000ms exceeded', 'timeout')));
      const base = { patch: threeOps, approvalRef: 'TICK-1', allowedStatuses: ['Approved'] };

      await gate.enforce({ ...base, enforcementEnabled: true });
      await gate.enforce({ ...base, enforcementEnabled: false });
      await failing.enforce({ ...base, enforcementEnabled: true });

      expect(await metrics.counterValue(METRIC_NAMES.enforceAttempts)).toBe(3);
      expect(await metrics.counterValue(METRIC_NAMES.enforceAccepted)).toBe(1);
      expect(await metrics.counterValue(METRIC_NAMES.enforceBlocked)).toBe(2);
    });

    it('should keep counts consistent under concurrent calls', async () => {
      const gate = gateWith(statusLookup('Approved'));

      await Promise.all(
        Array.from({ length: 10 }, (_, i) =>
          gate.enforce({
            patch: threeOps,
            approvalRef: `TICK-${i}`,
            allowedStatuses: ['Approved'],
            enforcementEnabled: i % 2 === 0,
          })
        )
      );

      expect(await metrics.counterValue(METRIC_NAMES.enforceAttempts)).toBe(10);
      expect(await metrics.counterValue(METRIC_NAMES.enforceAccepted)).toBe(5);
      expect(await metrics.counterValue(METRIC_NAMES.enforceBlocked)).toBe(5);
    });
  });
});
