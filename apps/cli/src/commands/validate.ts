/**
 * Validate Command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from '@starfleet/common';
import { withContext, type CliContext } from '../context.js';

export interface ValidateCommandOptions {
  config?: string;
}

/**
 * Check that the index loads and that every configured worker is registered
 * and resolves. The configuration itself was validated when the context loaded.
 */
export async function validateSetup(ctx: CliContext): Promise<number> {
  console.log(`${chalk.green('✓')} Configuration is valid`);

  try {
    await ctx.index.load();
  } catch (error) {
    console.log(`${chalk.red('✗')} Account index: ${errorMessage(error)}`);
    return 1;
  }
  console.log(`${chalk.green('✓')} Account index: ${ctx.index.size} accounts`);

  let problems = 0;
  for (const definition of ctx.engine.listWorkers()) {
    try {
      const plan = await ctx.engine.plan(definition.name);
      console.log(`${chalk.green('✓')} ${definition.name}: ${plan.targets.length} targets`);
    } catch (error) {
      problems++;
      console.log(`${chalk.red('✗')} ${definition.name}: ${errorMessage(error)}`);
    }
  }

  return problems === 0 ? 0 : 1;
}

export function validateCommand(): Command {
  return new Command('validate')
    .description('Validate the configuration, the account index and every worker')
    .option('-c, --config <path>', 'Configuration file')
    .action(async (options: ValidateCommandOptions) => {
      await withContext(options.config, validateSetup);
    });
}
