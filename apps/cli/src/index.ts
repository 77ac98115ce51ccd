#!/usr/bin/env node

/**
 * driftgate CLI
 *
 * Policy drift detection and approval-gated enforcement.
 *
 * Commands:
 *   driftgate diff <desired.json>         Show the patch from current to desired state
 *   driftgate enforce <patch.json>        Check a patch against its ticket's approval
 *
 * Both take --metrics to print the run's Prometheus counters to stderr.
 */

import { Command } from 'commander';
import { diffCommand, type DiffOptions } from './commands/diff.js';
import { enforceCommand, type EnforceOptions } from './commands/enforce.js';

const program = new Command();

program
  .name('driftgate')
  .description('Policy drift detection with approval-gated enforcement')
  .version('0.1.0');

program
  .command('diff <desired>')
  .description('Compute the patch that turns the current state into the desired state')
  .option('--current <file>', 'JSON file holding the current state')
  .option('--fetch-current', 'Fetch the current state from POLICY_SOURCE_BASE_URL')
  .option('--json', 'Output as JSON')
  .option('--metrics', 'Print Prometheus counters for this run to stderr')
  .action(async (desired: string, options: DiffOptions) => {
    process.exitCode = await diffCommand(desired, options);
  });

program
  .command('enforce <patch>')
  .description('Decide whether a patch may be applied, based on its ticket status')
  .requiredOption('-t, --ticket <key>', 'Ticket key holding the approval')
  .option('--allow <status...>', 'Allowed approval statuses (default: DRIFTGATE_ALLOW_STATUSES)')
  .option('--json', 'Output as JSON')
  .option('--metrics', 'Print Prometheus counters for this run to stderr')
  .action(async (patch: string, options: EnforceOptions) => {
    process.exitCode = await enforceCommand(patch, options);
  });

program.addHelpText('after', `
Exit codes (enforce):
  0  accepted
  1  error
  2  blocked

Environment:
  DRIFTGATE_ENFORCE_ENABLED    Set to true to allow accepting (default: disabled)
  DRIFTGATE_ALLOW_STATUSES     Comma-separated statuses (default: Approved,Ready for Change)
  DRIFTGATE_LOOKUP_TIMEOUT_MS  Approval lookup timeout (default: 30000)
  DRIFTGATE_DEBUG              Set to true for debug logs
  JIRA_BASE_URL, JIRA_EMAIL, JIRA_API_TOKEN
  POLICY_SOURCE_BASE_URL, POLICY_SOURCE_PATH, POLICY_SOURCE_TOKEN
`);

await program.parseAsync();
