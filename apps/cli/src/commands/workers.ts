/**
 * Workers Command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { formatDuration } from '@starfleet/common';
import { withContext, type CliContext } from '../context.js';

export interface WorkersCommandOptions {
  json?: boolean;
  config?: string;
}

export function listWorkers(ctx: CliContext, options: WorkersCommandOptions): number {
  const definitions = ctx.engine.listWorkers();

  if (options.json) {
    const workers = definitions.map(d => ({
      name: d.name,
      description: d.description,
      invocationMode: d.invocationMode,
      concurrency: d.concurrency,
      timeoutMs: d.timeoutMs,
      retry: d.retry,
      registered: ctx.registry.has(d.name),
    }));
    console.log(JSON.stringify(workers, null, 2));
    return 0;
  }

  if (definitions.length === 0) {
    console.log(chalk.yellow('No workers configured.'));
    return 0;
  }

  console.log(chalk.bold(`\nWorkers (${definitions.length}):\n`));
  for (const d of definitions) {
    const registered = ctx.registry.has(d.name);
    console.log(
      chalk.cyan(d.name.padEnd(20)) +
      d.invocationMode.padEnd(12) +
      chalk.gray(`concurrency ${d.concurrency}, ${d.retry.maxAttempts} attempts, timeout ${formatDuration(d.timeoutMs)}`) +
      (registered ? '' : chalk.red('  (no implementation registered)'))
    );
    if (d.description) {
      console.log(chalk.gray(`  ${d.description}`));
    }
  }
  console.log();
  return 0;
}

export function workersCommand(): Command {
  return new Command('workers')
    .alias('ls')
    .description('List configured workers')
    .option('--json', 'Output as JSON')
    .option('-c, --config <path>', 'Configuration file')
    .action(async (options: WorkersCommandOptions) => {
      await withContext(options.config, async ctx => listWorkers(ctx, options));
    });
}
