/**
 * Jira Approval Connector
 *
 * @module @driftgate/connectors/jira
 */

export { JiraApprovalConnector } from './jira-approval-connector.js';

export { readJiraConfigFromEnv, createApprovalLookupFromEnv } from './factory.js';

export type { JiraApprovalConfig, JiraIssueStatus } from './types.js';

export {
  JiraApprovalConfigSchema,
  JiraIssueStatusSchema,
  JiraCurrentUserSchema,
  DEFAULT_JIRA_TIMEOUT_MS,
} from './types.js';
