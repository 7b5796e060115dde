/**
 * Run Command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { errorMessage, type RunRecord } from '@starfleet/common';
import type { RunStartEvent } from '@starfleet/engine';
import { withContext, type CliContext } from '../context.js';
import { printReport } from '../format.js';

/** Conventional exit code for a process stopped by SIGINT */
export const CANCELLED_EXIT_CODE = 130;

export interface RunCommandOptions {
  account?: string[];
  region?: string[];
  dryRun?: boolean;
  json?: boolean;
  /** `--no-history` sets this to false */
  history?: boolean;
  config?: string;
}

/**
 * Run a worker and print its report. Resolves to the exit code:
 * 130 when the run was cancelled, otherwise 0 only when the report status is
 * success.
 */
export async function executeRun(
  ctx: CliContext,
  worker: string,
  options: RunCommandOptions,
  signal?: AbortSignal
): Promise<number> {
  const spinner: Ora | undefined = options.json ? undefined : ora(`Resolving targets for "${worker}"...`).start();
  let total = 0;
  let completed = 0;

  const onStart = (event: RunStartEvent) => {
    total = event.targets;
    if (spinner) spinner.text = `Running "${worker}" against ${total} targets...`;
  };
  const onComplete = () => {
    completed++;
    if (spinner) spinner.text = `Running "${worker}": ${completed}/${total} targets complete`;
  };
  ctx.engine.on('run:start', onStart);
  ctx.engine.on('target:complete', onComplete);

  let record: RunRecord;
  try {
    record = await ctx.engine.run(worker, {
      accounts: options.account,
      regions: options.region,
      dryRun: options.dryRun,
      signal,
    });
  } catch (error) {
    if (spinner) {
      spinner.fail(`Run of "${worker}" failed: ${errorMessage(error)}`);
    } else {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
    }
    return 1;
  } finally {
    ctx.engine.off('run:start', onStart);
    ctx.engine.off('target:complete', onComplete);
  }

  if (ctx.history && options.history !== false) {
    ctx.history.save(record);
  }

  if (options.json) {
    console.log(JSON.stringify(record, null, 2));
  } else if (spinner) {
    const message = `"${worker}" finished: ${record.report.status}`;
    if (record.report.status === 'success') spinner.succeed(message);
    else if (record.report.status === 'partial-failure') spinner.warn(message);
    else spinner.fail(message);
    printReport(record);
  }

  if (record.cancelled) {
    return CANCELLED_EXIT_CODE;
  }
  return record.report.status === 'success' ? 0 : 1;
}

export function runCommand(): Command {
  return new Command('run')
    .description('Run a worker against every target its rule resolves')
    .argument('<worker>', 'Configured worker name')
    .option('-a, --account <accounts...>', 'Only these account IDs or names')
    .option('-r, --region <regions...>', 'Only these regions')
    .option('--dry-run', 'Resolve targets without invoking the worker')
    .option('--no-history', 'Do not record the run in history')
    .option('--json', 'Output the run record as JSON')
    .option('-c, --config <path>', 'Configuration file')
    .action(async (worker: string, options: RunCommandOptions) => {
      await withContext(options.config, async (ctx) => {
        const controller = new AbortController();
        const onInterrupt = () => {
          console.error(chalk.yellow('\nCancelling: waiting for running targets to finish...'));
          controller.abort();
        };
        process.once('SIGINT', onInterrupt);
        try {
          return await executeRun(ctx, worker, options, controller.signal);
        } finally {
          process.removeListener('SIGINT', onInterrupt);
        }
      });
    });
}
