import axios, { type AxiosInstance } from 'axios';
import {
  LookupError,
  METRIC_NAMES,
  approvalFound,
  type ApprovalLookup,
  type ApprovalLookupOptions,
  type ApprovalLookupResult,
  type ApprovalReference,
  type Logger,
  type LookupFailureReason,
} from '@driftgate/core';
import { BaseConnector, describeHttpFailure, type ConnectorOptions, type HealthStatus } from '../core/base-connector.js';
import {
  DEFAULT_JIRA_TIMEOUT_MS,
  JiraApprovalConfigSchema,
  JiraCurrentUserSchema,
  JiraIssueStatusSchema,
  type JiraApprovalConfig,
} from './types.js';

/**
 * Jira Approval Connector
 *
 * Reads the workflow status of a single issue and reports it as an approval
 * state. One GET per lookup, no retries; every failure comes back as a
 * failed result classified by reason.
 *
 * @module @driftgate/connectors/jira
 */
export class JiraApprovalConnector extends BaseConnector implements ApprovalLookup {
  readonly name = 'jira';

  private readonly client: AxiosInstance;

  constructor(config: JiraApprovalConfig, options: ConnectorOptions = {}) {
    super(options, 'jira-approval-connector');
    const jiraConfig = this.parseConfig(JiraApprovalConfigSchema, config);

    const authHeader = `Basic ${Buffer.from(`${jiraConfig.email}:${jiraConfig.apiToken}`).toString('base64')}`;

    this.client = axios.create({
      baseURL: `${jiraConfig.baseUrl.replace(/\/+$/, '')}/rest/api/3`,
      timeout: jiraConfig.timeout ?? DEFAULT_JIRA_TIMEOUT_MS,
      headers: {
        'Authorization': authHeader,
        'Accept': 'application/json',
      },
    });
  }

  // ============================================================================
  // ApprovalLookup Implementation
  // ============================================================================

  async getApproval(reference: ApprovalReference, options: ApprovalLookupOptions = {}): Promise<ApprovalLookupResult> {
    const log = this.logger.child({ connector: this.name, reference });

    let body: unknown;
    try {
      const response = await this.client.get<unknown>(`/issue/${encodeURIComponent(reference)}`, {
        params: { fields: 'status' },
        signal: options.signal,
      });
      body = response.data;
    } catch (error) {
      return this.failed(classifyRequestFailure(error, reference), log);
    }

    const parsed = JiraIssueStatusSchema.safeParse(body);
    if (!parsed.success) {
      return this.failed(
        new LookupError(`issue ${reference} response has no status name`, 'malformed_response', { reference }),
        log
      );
    }

    const status = parsed.data.fields.status.name;
    this.metrics.increment(METRIC_NAMES.lookupRequests, 1, { outcome: 'ok' });
    log.debug('Approval status fetched', { status });
    return approvalFound(status);
  }

  /**
   * Check that the site is reachable and the credentials are accepted
   */
  async healthCheck(): Promise<HealthStatus> {
    const check = await this.runCheck('api_connectivity', async () => {
      const { data } = await this.client.get<unknown>('/myself');
      JiraCurrentUserSchema.parse(data);
    });
    return this.healthStatus([check]);
  }

  private failed(error: LookupError, log: Logger): ApprovalLookupResult {
    this.metrics.increment(METRIC_NAMES.lookupRequests, 1, { outcome: error.reason });
    log.warn('Approval lookup failed', { reason: error.reason, error: error.message });
    return { ok: false, error };
  }
}

function classifyRequestFailure(error: unknown, reference: string): LookupError {
  const failure = describeHttpFailure(error);
  const context = { reference, status: failure.status, code: failure.code };

  let reason: LookupFailureReason;
  let message: string;

  if (failure.status === 401 || failure.status === 403) {
    reason = 'authorization';
    message = `credentials rejected with status ${failure.status}`;
  } else if (failure.status === 404) {
    reason = 'not_found';
    message = `issue ${reference} not found`;
  } else if (failure.code === 'ERR_CANCELED') {
    reason = 'aborted';
    message = 'request aborted';
  } else if (failure.code === 'ECONNABORTED' || failure.code === 'ETIMEDOUT') {
    reason = 'timeout';
    message = failure.message;
  } else {
    reason = 'transport';
    message = failure.message;
  }

  return new LookupError(message, reason, context);
}
