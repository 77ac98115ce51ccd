import axios, { type AxiosInstance } from 'axios';
import { parseConfigTree, type ConfigTree } from '@driftgate/core';
import { BaseConnector, describeHttpFailure, type ConnectorOptions, type HealthStatus } from '../core/base-connector.js';
import { AuthenticationError, NetworkError } from '../errors/index.js';
import {
  DEFAULT_POLICY_SOURCE_PATH,
  DEFAULT_POLICY_SOURCE_TIMEOUT_MS,
  PolicySourceConfigSchema,
  type FetchCurrentStateOptions,
  type PolicySourceConfig,
} from './types.js';

/**
 * HTTP Policy Source
 *
 * Reads the live policy state that `diff --fetch-current` compares against.
 * A response wrapped as `{ data: ... }` is unwrapped; anything else is taken
 * as the state itself.
 *
 * @module @driftgate/connectors/policy-source
 */
export class HttpPolicySource extends BaseConnector {
  readonly name = 'policy-source';

  private readonly client: AxiosInstance;
  private readonly path: string;

  constructor(config: PolicySourceConfig, options: ConnectorOptions = {}) {
    super(options, 'http-policy-source');
    const sourceConfig = this.parseConfig(PolicySourceConfigSchema, config);

    this.path = `/${(sourceConfig.path ?? DEFAULT_POLICY_SOURCE_PATH).replace(/^\/+/, '')}`;
    this.client = axios.create({
      baseURL: sourceConfig.baseUrl.replace(/\/+$/, ''),
      timeout: sourceConfig.timeout ?? DEFAULT_POLICY_SOURCE_TIMEOUT_MS,
      headers: {
        'Accept': 'application/json',
        ...(sourceConfig.token ? { 'Authorization': `Bearer ${sourceConfig.token}` } : {}),
      },
    });
  }

  /**
   * Fetch the current policy state.
   *
   * @throws {AuthenticationError} On 401 or 403
   * @throws {NetworkError} On any other request failure
   * @throws {ValidationError} (from @driftgate/core) If the body is not a config tree
   */
  async fetchCurrentState(options: FetchCurrentStateOptions = {}): Promise<ConfigTree> {
    let body: unknown;
    try {
      const response = await this.client.get<unknown>(this.path, { signal: options.signal });
      body = response.data;
    } catch (error) {
      const failure = describeHttpFailure(error);
      this.logger.warn('Policy state fetch failed', { path: this.path, status: failure.status, code: failure.code });

      if (failure.status === 401 || failure.status === 403) {
        throw new AuthenticationError(`Policy source rejected credentials (${failure.status})`, this.name, {
          path: this.path,
        });
      }
      throw new NetworkError(`Policy state fetch failed: ${failure.message}`, this.name, failure.status, {
        path: this.path,
        code: failure.code,
      });
    }

    const state = parseConfigTree(unwrapData(body), 'current state');
    this.logger.debug('Policy state fetched', { path: this.path });
    return state;
  }

  async healthCheck(): Promise<HealthStatus> {
    const check = await this.runCheck('policy_state', () => this.fetchCurrentState());
    return this.healthStatus([check]);
  }
}

function unwrapData(body: unknown): unknown {
  if (typeof body === 'object' && body !== null && !Array.isArray(body) && 'data' in body) {
    return body.data;
  }
  return body;
}
