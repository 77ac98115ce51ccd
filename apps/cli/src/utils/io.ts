import { readFile } from 'node:fs/promises';
import chalk from 'chalk';
import { ValidationError, type PrometheusMetrics } from '@driftgate/core';

/**
 * Read and parse a JSON document from disk
 */
export async function readJsonFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new Error(`Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new Error(`Invalid JSON in ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Print a command failure, including validation issues when present
 */
export function outputError(error: unknown, json: boolean | undefined): void {
  const message = error instanceof Error ? error.message : String(error);
  const issues = error instanceof ValidationError ? error.issues : [];

  if (json) {
    console.log(JSON.stringify({ status: 'error', message, issues }, null, 2));
    return;
  }

  console.error(chalk.red(`\n  ✗ ${message}`));
  for (const issue of issues) {
    console.error(chalk.red(`    ${issue.path}: ${issue.message}`));
  }
  console.error();
}

/**
 * Write this run's Prometheus exposition to stderr
 */
export async function outputMetrics(metrics: PrometheusMetrics): Promise<void> {
  process.stderr.write(await metrics.render());
}
