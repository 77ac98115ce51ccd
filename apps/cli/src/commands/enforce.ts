/**
 * driftgate enforce command
 *
 * Run a patch through the policy state gate. The patch is only authorized,
 * never applied; the decision is printed for whatever applies it.
 *
 * Exit codes:
 *   0 - Accepted
 *   1 - Error (unreadable or malformed patch, bad configuration)
 *   2 - Blocked
 *
 * Environment:
 *   DRIFTGATE_ENFORCE_ENABLED, DRIFTGATE_ALLOW_STATUSES,
 *   DRIFTGATE_LOOKUP_TIMEOUT_MS, JIRA_BASE_URL, JIRA_EMAIL, JIRA_API_TOKEN
 */

import chalk from 'chalk';
import ora from 'ora';
import {
  getMetrics,
  parsePatch,
  type ApprovalLookup,
  type Logger,
  type PrometheusMetrics,
} from '@driftgate/core';
import { PolicyStateGate, readGateConfigFromEnv, type EnforcementDecision } from '@driftgate/engine';
import { createApprovalLookupFromEnv } from '@driftgate/connectors';
import { outputError, outputMetrics, readJsonFile } from '../utils/io.js';

export interface EnforceOptions {
  /** Ticket key whose status authorizes the change */
  ticket: string;
  /** Overrides DRIFTGATE_ALLOW_STATUSES */
  allow?: string[];
  json?: boolean;
  /** Print this run's counters to stderr afterwards */
  metrics?: boolean;
}

export interface EnforceDependencies {
  /** Overrides the lookup built from JIRA_* */
  lookup?: ApprovalLookup;
  metrics?: PrometheusMetrics;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

export interface EnforceResult extends EnforcementDecision {
  ticket: string;
  patchOps: number;
}

/**
 * Returns the process exit code
 */
export async function enforceCommand(
  patchPath: string,
  options: EnforceOptions,
  deps: EnforceDependencies = {}
): Promise<number> {
  const metrics = deps.metrics ?? getMetrics();
  let exitCode: number;

  try {
    const env = deps.env ?? process.env;
    const config = readGateConfigFromEnv(env);
    const patch = parsePatch(await readJsonFile(patchPath));
    const lookup = deps.lookup ?? createApprovalLookupFromEnv(env, { metrics, logger: deps.logger });
    const allowedStatuses = options.allow && options.allow.length > 0 ? options.allow : config.allowedStatuses;

    const gate = new PolicyStateGate({ lookup, metrics, logger: deps.logger });

    const spinner = ora({ text: `Checking approval for ${options.ticket}...`, isSilent: options.json }).start();
    const decision = await gate.enforce({
      patch,
      approvalRef: options.ticket,
      allowedStatuses,
      enforcementEnabled: config.enforcementEnabled,
      signal: AbortSignal.timeout(config.lookupTimeoutMs),
    });
    spinner.stop();

    outputDecision({ ...decision, ticket: options.ticket, patchOps: patch.length }, options);
    exitCode = decision.outcome === 'accepted' ? 0 : 2;
  } catch (error) {
    outputError(error, options.json);
    exitCode = 1;
  }

  if (options.metrics) {
    await outputMetrics(metrics);
  }
  return exitCode;
}

// =============================================================================
// Output
// =============================================================================

function outputDecision(result: EnforceResult, options: EnforceOptions): void {
  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  const accepted = result.outcome === 'accepted';
  const icon = accepted ? chalk.green('✓') : chalk.red('✗');
  const statusText = accepted ? chalk.green('ACCEPTED') : chalk.red('BLOCKED');

  console.log();
  console.log(`  ${icon} Enforce: ${statusText}`);
  console.log();
  console.log(`    Ticket:      ${result.ticket}`);
  console.log(`    Operations:  ${result.appliedOpsCount}/${result.patchOps}`);
  console.log(`    Reason:      ${result.reason}`);
  console.log();

  if (!accepted) {
    console.log(chalk.dim('  Nothing may be applied until the ticket reaches an allowed status'));
    console.log();
  }
}
