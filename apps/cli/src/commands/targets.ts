/**
 * Targets Command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { toTargetRef } from '@starfleet/engine';
import { withContext, type CliContext } from '../context.js';

export interface TargetsCommandOptions {
  account?: string[];
  region?: string[];
  json?: boolean;
  config?: string;
}

/**
 * Print the targets a run would dispatch to, without dispatching
 */
export async function listTargets(ctx: CliContext, worker: string, options: TargetsCommandOptions): Promise<number> {
  const plan = await ctx.engine.plan(worker, { accounts: options.account, regions: options.region });
  const targets = plan.targets.map(toTargetRef);

  if (options.json) {
    console.log(JSON.stringify(targets, null, 2));
    return 0;
  }

  if (targets.length === 0) {
    console.log(chalk.yellow(`No targets resolved for "${worker}".`));
    return 0;
  }

  console.log(chalk.bold(`\n${worker}: ${targets.length} targets\n`));
  const regionWidth = Math.max(...targets.map(t => t.region.length));
  for (const target of targets) {
    console.log(`  ${chalk.cyan(target.accountId)}  ${target.region.padEnd(regionWidth)}  ${chalk.gray(target.accountName)}`);
  }
  console.log();
  return 0;
}

export function targetsCommand(): Command {
  return new Command('targets')
    .description('Show the targets a worker resolves to')
    .argument('<worker>', 'Configured worker name')
    .option('-a, --account <accounts...>', 'Only these account IDs or names')
    .option('-r, --region <regions...>', 'Only these regions')
    .option('--json', 'Output as JSON')
    .option('-c, --config <path>', 'Configuration file')
    .action(async (worker: string, options: TargetsCommandOptions) => {
      await withContext(options.config, ctx => listTargets(ctx, worker, options));
    });
}
