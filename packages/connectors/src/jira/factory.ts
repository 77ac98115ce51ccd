/**
 * Jira Connector Factory
 *
 * Builds the approval lookup from environment configuration.
 */

import { UnconfiguredApprovalLookup, type ApprovalLookup } from '@driftgate/core';
import { JiraApprovalConnector } from './jira-approval-connector.js';
import { JiraApprovalConfigSchema, type JiraApprovalConfig } from './types.js';
import { ValidationError } from '../errors/index.js';
import type { ConnectorOptions } from '../core/base-connector.js';

/**
 * Read Jira settings from the environment.
 *
 * Returns null when JIRA_BASE_URL is unset or blank.
 *
 * @throws {ValidationError} If JIRA_BASE_URL is set but the settings are incomplete
 */
export function readJiraConfigFromEnv(env: NodeJS.ProcessEnv = process.env): JiraApprovalConfig | null {
  const baseUrl = env.JIRA_BASE_URL?.trim();
  if (!baseUrl) {
    return null;
  }

  const parsed = JiraApprovalConfigSchema.safeParse({
    baseUrl,
    email: env.JIRA_EMAIL ?? '',
    apiToken: env.JIRA_API_TOKEN ?? '',
  });

  if (!parsed.success) {
    throw new ValidationError(
      'Invalid jira configuration',
      'jira',
      parsed.error.errors.map((e) => ({
        field: e.path.join('.'),
        message: e.message,
      }))
    );
  }

  return parsed.data;
}

/**
 * Create the approval lookup for the current environment.
 *
 * @example
 * ```typescript
 * const lookup = createApprovalLookupFromEnv();
 * const result = await lookup.getApproval('OPS-42');
 * ```
 */
export function createApprovalLookupFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  options: ConnectorOptions = {}
): ApprovalLookup {
  const config = readJiraConfigFromEnv(env);
  return config ? new JiraApprovalConnector(config, options) : new UnconfiguredApprovalLookup();
}
