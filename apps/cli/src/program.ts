/**
 * starfleet program definition
 */

import { Command } from 'commander';
import { historyCommands } from './commands/history.js';
import { runCommand } from './commands/run.js';
import { targetsCommand } from './commands/targets.js';
import { validateCommand } from './commands/validate.js';
import { workersCommand } from './commands/workers.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('starfleet')
    .description('Run workers across many accounts and regions')
    .version(VERSION);

  program.addCommand(runCommand());
  program.addCommand(targetsCommand());
  program.addCommand(workersCommand());
  program.addCommand(historyCommands());
  program.addCommand(validateCommand());

  return program;
}

export { createContext, loadContext, type CliContext, type ContextOverrides } from './context.js';
