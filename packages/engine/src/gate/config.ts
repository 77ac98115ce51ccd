/**
 * Gate Configuration
 *
 * Reads gate settings from environment variables. The gate itself never reads
 * the environment; callers read once per invocation and pass the values in.
 *
 * Environment Variables:
 * - DRIFTGATE_ENFORCE_ENABLED: `true` enables enforcement (default: disabled)
 * - DRIFTGATE_ALLOW_STATUSES: comma-separated approval statuses
 *   (default: Approved,Ready for Change)
 * - DRIFTGATE_LOOKUP_TIMEOUT_MS: approval lookup timeout (default: 30000)
 *
 * @module @driftgate/engine/gate
 */

import type { GateConfig } from './types.js';

export const DEFAULT_ALLOWED_STATUSES: readonly string[] = ['Approved', 'Ready for Change'];

export const DEFAULT_GATE_CONFIG: GateConfig = {
  enforcementEnabled: false,
  allowedStatuses: [...DEFAULT_ALLOWED_STATUSES],
  lookupTimeoutMs: 30000,
};

/**
 * Split a comma-separated list, trimming entries and dropping empty ones
 */
export function parseStatusList(raw: string): string[] {
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function readGateConfigFromEnv(env: NodeJS.ProcessEnv = process.env): GateConfig {
  const statuses = env.DRIFTGATE_ALLOW_STATUSES ? parseStatusList(env.DRIFTGATE_ALLOW_STATUSES) : [];
  const timeout = parseInt(env.DRIFTGATE_LOOKUP_TIMEOUT_MS || '', 10);

  return {
    enforcementEnabled: (env.DRIFTGATE_ENFORCE_ENABLED ?? '').trim().toLowerCase() === 'true',
    allowedStatuses: statuses.length > 0 ? statuses : [...DEFAULT_GATE_CONFIG.allowedStatuses],
    lookupTimeoutMs: timeout > 0 ? timeout : DEFAULT_GATE_CONFIG.lookupTimeoutMs,
  };
}
