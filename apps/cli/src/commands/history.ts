/**
 * History Commands
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import type { RunHistoryStore, RunSummary } from '@starfleet/storage';
import { requireHistory, withContext } from '../context.js';
import { formatOutcome, formatTimestamp, printReport, runStatusColour } from '../format.js';

export interface HistoryListOptions {
  worker?: string;
  limit?: number;
  json?: boolean;
  config?: string;
}

export interface HistoryShowOptions {
  json?: boolean;
  config?: string;
}

export interface HistoryPruneOptions {
  keep: number;
  config?: string;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function formatRun(run: RunSummary): string {
  const flags = [run.dryRun ? 'dry run' : '', run.cancelled ? 'cancelled' : ''].filter(Boolean).join(', ');
  return (
    `  ${chalk.cyan(run.runId)}  ` +
    `${run.worker.padEnd(16)}` +
    `${runStatusColour(run.status)(run.status.padEnd(16))}` +
    `${run.succeeded}/${run.totalTargets} succeeded  ` +
    chalk.gray(formatTimestamp(run.startedAt)) +
    (flags ? chalk.yellow(`  (${flags})`) : '')
  );
}

export function listRuns(store: RunHistoryStore, options: HistoryListOptions): number {
  const runs = store.list({ worker: options.worker, limit: options.limit });

  if (options.json) {
    console.log(JSON.stringify(runs, null, 2));
    return 0;
  }

  if (runs.length === 0) {
    console.log(chalk.yellow('No runs recorded.'));
    return 0;
  }

  console.log(chalk.bold(`\nRecent runs (${runs.length} of ${store.count(options.worker)}):\n`));
  for (const run of runs) {
    console.log(formatRun(run));
  }
  console.log();
  return 0;
}

export function showRun(store: RunHistoryStore, runId: string, options: HistoryShowOptions): number {
  const record = store.get(runId);
  if (!record) {
    console.error(chalk.red(`Run "${runId}" not found`));
    return 1;
  }

  if (options.json) {
    console.log(JSON.stringify(record, null, 2));
    return 0;
  }

  printReport(record);
  console.log(chalk.bold(`  Outcomes (${record.outcomes.length}):`));
  for (const outcome of record.outcomes) {
    console.log(`    ${formatOutcome(outcome)}`);
  }
  console.log();
  return 0;
}

export function pruneRuns(store: RunHistoryStore, options: HistoryPruneOptions): number {
  const deleted = store.prune(options.keep);
  console.log(chalk.green(`Deleted ${deleted} runs, kept the latest ${options.keep} per worker`));
  return 0;
}

export function historyCommands(): Command {
  const history = new Command('history')
    .description('Inspect past runs');

  history
    .command('list', { isDefault: true })
    .description('List recent runs')
    .option('-w, --worker <name>', 'Only runs of this worker')
    .option('-n, --limit <n>', 'Number of runs to show', parsePositiveInt, 20)
    .option('--json', 'Output as JSON')
    .option('-c, --config <path>', 'Configuration file')
    .action(async (options: HistoryListOptions) => {
      await withContext(options.config, async ctx => listRuns(requireHistory(ctx), options));
    });

  history
    .command('show <runId>')
    .description('Show every target outcome of a run')
    .option('--json', 'Output as JSON')
    .option('-c, --config <path>', 'Configuration file')
    .action(async (runId: string, options: HistoryShowOptions) => {
      await withContext(options.config, async ctx => showRun(requireHistory(ctx), runId, options));
    });

  history
    .command('prune')
    .description('Delete old runs, keeping the latest per worker')
    .option('-k, --keep <n>', 'Runs to keep per worker', parsePositiveInt, 10)
    .option('-c, --config <path>', 'Configuration file')
    .action(async (options: HistoryPruneOptions) => {
      await withContext(options.config, async ctx => pruneRuns(requireHistory(ctx), options));
    });

  return history;
}
