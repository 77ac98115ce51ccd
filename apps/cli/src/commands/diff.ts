/**
 * driftgate diff command
 *
 * Compute the patch that turns the current policy state into the desired
 * one and print its summary.
 *
 * Current state comes from --current, from the policy source with
 * --fetch-current, or defaults to an empty mapping.
 */

import chalk from 'chalk';
import ora from 'ora';
import {
  METRIC_NAMES,
  buildDiffReport,
  getMetrics,
  parseConfigTree,
  type ConfigTree,
  type DiffReport,
  type PatchOperation,
  type PrometheusMetrics,
} from '@driftgate/core';
import { createPolicySourceFromEnv } from '@driftgate/connectors';
import { outputError, outputMetrics, readJsonFile } from '../utils/io.js';

export interface DiffOptions {
  /** Path to a JSON file holding the current state */
  current?: string;
  /** Fetch the current state from the configured policy source */
  fetchCurrent?: boolean;
  json?: boolean;
  /** Print this run's counters to stderr afterwards */
  metrics?: boolean;
}

export interface CurrentStateSource {
  fetchCurrentState(): Promise<ConfigTree>;
}

export interface DiffDependencies {
  metrics?: PrometheusMetrics;
  /** Overrides the source built from POLICY_SOURCE_* */
  policySource?: CurrentStateSource;
  env?: NodeJS.ProcessEnv;
}

/**
 * Returns the process exit code
 */
export async function diffCommand(
  desiredPath: string,
  options: DiffOptions = {},
  deps: DiffDependencies = {}
): Promise<number> {
  const metrics = deps.metrics ?? getMetrics();
  let exitCode: number;

  try {
    const desired = parseConfigTree(await readJsonFile(desiredPath), 'desired state');
    const current = await resolveCurrentState(options, deps);

    const report = buildDiffReport(current, desired);
    metrics.increment(METRIC_NAMES.diffs);

    outputReport(report, options);
    exitCode = 0;
  } catch (error) {
    outputError(error, options.json);
    exitCode = 1;
  }

  if (options.metrics) {
    await outputMetrics(metrics);
  }
  return exitCode;
}

async function resolveCurrentState(options: DiffOptions, deps: DiffDependencies): Promise<ConfigTree> {
  if (options.current) {
    return parseConfigTree(await readJsonFile(options.current), 'current state');
  }

  if (!options.fetchCurrent) {
    return {};
  }

  const source = deps.policySource ?? createPolicySourceFromEnv(deps.env ?? process.env);
  if (!source) {
    throw new Error('--fetch-current needs POLICY_SOURCE_BASE_URL to be set');
  }

  const spinner = ora({ text: 'Fetching current policy state...', isSilent: options.json }).start();
  try {
    const state = await source.fetchCurrentState();
    spinner.succeed('Fetched current policy state');
    return state;
  } catch (error) {
    spinner.fail('Could not fetch current policy state');
    throw error;
  }
}

// =============================================================================
// Output
// =============================================================================

function outputReport(report: DiffReport, options: DiffOptions): void {
  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  if (report.changes === 0) {
    console.log(chalk.green('\n  ✓ No changes\n'));
    return;
  }

  console.log();
  console.log(chalk.bold(`  ${report.changes} change${report.changes === 1 ? '' : 's'}:`));
  report.patch.forEach((operation, i) => {
    console.log(`    ${colorFor(operation)(report.summary[i])}`);
  });
  console.log();
}

function colorFor(operation: PatchOperation): (text: string) => string {
  switch (operation.op) {
    case 'add':
      return chalk.green;
    case 'remove':
      return chalk.red;
    case 'replace':
      return chalk.yellow;
  }
}
