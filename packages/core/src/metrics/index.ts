/**
 * Metrics
 *
 * Counter interface with a prom-client implementation. Counters are
 * created lazily on first use and live in a per-instance registry, so tests
 * can use a fresh instance without touching the process-wide one.
 *
 * @module @driftgate/core/metrics
 */

import { Counter, Registry } from 'prom-client';

/**
 * Metric names used across packages
 */
export const METRIC_NAMES = {
  enforceAttempts: 'driftgate_enforce_attempts_total',
  enforceAccepted: 'driftgate_enforce_accepted_total',
  enforceBlocked: 'driftgate_enforce_blocked_total',
  diffs: 'driftgate_diffs_total',
  lookupRequests: 'driftgate_approval_lookup_requests_total',
} as const;

/**
 * Metrics interface for instrumentation
 */
export interface IMetrics {
  increment(name: string, value?: number, labels?: Record<string, string>): void;
}

/**
 * Prometheus metrics implementation
 */
export class PrometheusMetrics implements IMetrics {
  private readonly registry = new Registry();
  private readonly counters = new Map<string, Counter>();

  increment(name: string, value: number = 1, labels?: Record<string, string>): void {
    let counter = this.counters.get(name);

    if (!counter) {
      counter = new Counter({
        name,
        help: `Counter for ${name}`,
        labelNames: labels ? Object.keys(labels) : [],
        registers: [this.registry],
      });
      this.counters.set(name, counter);
    }

    if (labels) {
      counter.inc(labels, value);
    } else {
      counter.inc(value);
    }
  }

  /**
   * Current value of a counter summed over all label sets; 0 if never incremented
   */
  async counterValue(name: string): Promise<number> {
    const counter = this.counters.get(name);
    if (!counter) {
      return 0;
    }
    const snapshot = await counter.get();
    return snapshot.values.reduce((sum, sample) => sum + sample.value, 0);
  }

  /**
   * Prometheus exposition text for everything recorded so far
   */
  render(): Promise<string> {
    return this.registry.metrics();
  }
}

// =============================================================================
// Process-wide instance
// =============================================================================

let metricsInstance: PrometheusMetrics | null = null;

export function getMetrics(): PrometheusMetrics {
  if (!metricsInstance) {
    metricsInstance = new PrometheusMetrics();
  }
  return metricsInstance;
}

export function setMetrics(metrics: PrometheusMetrics): void {
  metricsInstance = metrics;
}

/**
 * Reset the process-wide metrics (for testing)
 */
export function resetMetrics(): void {
  metricsInstance = null;
}
