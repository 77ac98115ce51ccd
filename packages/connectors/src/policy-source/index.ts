/**
 * @module @driftgate/connectors/policy-source
 */

export { HttpPolicySource } from './http-policy-source.js';
export { readPolicySourceConfigFromEnv, createPolicySourceFromEnv } from './factory.js';
export type { PolicySourceConfig, FetchCurrentStateOptions } from './types.js';
export {
  PolicySourceConfigSchema,
  DEFAULT_POLICY_SOURCE_PATH,
  DEFAULT_POLICY_SOURCE_TIMEOUT_MS,
} from './types.js';
