import { z } from 'zod';

/**
 * Policy Source Type Definitions
 *
 * @module @driftgate/connectors/policy-source
 */

export const DEFAULT_POLICY_SOURCE_PATH = 'mgmtconfig/v2/admin/applications';

export const DEFAULT_POLICY_SOURCE_TIMEOUT_MS = 30000;

/**
 * Where the current policy state is read from
 */
export interface PolicySourceConfig {
  baseUrl: string;

  /**
   * Path below baseUrl, with or without a leading slash
   */
  path?: string;

  /**
   * Sent as a bearer token when present
   */
  token?: string;

  timeout?: number;
}

export const PolicySourceConfigSchema = z.object({
  baseUrl: z.string().url(),
  path: z.string().optional(),
  token: z.string().min(1).optional(),
  timeout: z.number().int().positive().optional(),
});

export interface FetchCurrentStateOptions {
  signal?: AbortSignal;
}
