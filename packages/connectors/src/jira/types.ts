import { z } from 'zod';

/**
 * Jira Approval Connector Type Definitions
 *
 * @module @driftgate/connectors/jira
 */

// ============================================================================
// Configuration
// ============================================================================

/**
 * Jira approval connector configuration (API token authentication)
 */
export interface JiraApprovalConfig {
  /**
   * Site URL, e.g. https://example.atlassian.net
   */
  baseUrl: string;

  email: string;

  apiToken: string;

  /**
   * Request timeout in milliseconds (default: 30000)
   */
  timeout?: number;
}

export const JiraApprovalConfigSchema = z.object({
  baseUrl: z.string().url(),
  email: z.string().min(1),
  apiToken: z.string().min(1),
  timeout: z.number().int().positive().optional(),
});

export const DEFAULT_JIRA_TIMEOUT_MS = 30000;

// ============================================================================
// Responses
// ============================================================================

/**
 * The part of GET /issue/{key}?fields=status the connector reads
 */
export const JiraIssueStatusSchema = z.object({
  key: z.string().optional(),
  fields: z.object({
    status: z.object({
      name: z.string(),
    }),
  }),
});

export type JiraIssueStatus = z.infer<typeof JiraIssueStatusSchema>;

export const JiraCurrentUserSchema = z.object({
  accountId: z.string(),
  displayName: z.string().optional(),
});
