import { HttpPolicySource } from './http-policy-source.js';
import { DEFAULT_POLICY_SOURCE_PATH, type PolicySourceConfig } from './types.js';
import type { ConnectorOptions } from '../core/base-connector.js';

/**
 * Read policy source settings from the environment.
 *
 * Returns null when POLICY_SOURCE_BASE_URL is unset or blank.
 */
export function readPolicySourceConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PolicySourceConfig | null {
  const baseUrl = env.POLICY_SOURCE_BASE_URL?.trim();
  if (!baseUrl) {
    return null;
  }

  const token = env.POLICY_SOURCE_TOKEN?.trim();
  return {
    baseUrl,
    path: env.POLICY_SOURCE_PATH?.trim() || DEFAULT_POLICY_SOURCE_PATH,
    ...(token ? { token } : {}),
  };
}

export function createPolicySourceFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  options: ConnectorOptions = {}
): HttpPolicySource | null {
  const config = readPolicySourceConfigFromEnv(env);
  return config ? new HttpPolicySource(config, options) : null;
}
