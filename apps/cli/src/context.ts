/**
 * CLI context
 *
 * Builds the account index, worker registry, engine and history store from a
 * configuration file. Each command invocation gets its own context and closes
 * it when done.
 */

import chalk from 'chalk';
import { AccountIndex, FileIndexSource, type IndexSource } from '@starfleet/account-index';
import {
  CONFIG_ENV_VAR,
  ConfigurationError,
  errorMessage,
  findConfigPath,
  loadConfig,
  parseLogLevel,
  setLogLevel,
  type StarfleetConfig,
} from '@starfleet/common';
import {
  StarfleetEngine,
  WorkerRegistry,
  buildWorkerDefinitions,
  builtinWorkers,
  type StarfleetWorker,
} from '@starfleet/engine';
import { RunHistoryStore, openDatabase, type SqliteDatabase } from '@starfleet/storage';

export const LOG_LEVEL_ENV_VAR = 'STARFLEET_LOG_LEVEL';

export interface CliContext {
  config: StarfleetConfig;
  index: AccountIndex;
  registry: WorkerRegistry;
  engine: StarfleetEngine;
  /** Absent when history is disabled */
  history?: RunHistoryStore;
  close(): void;
}

export interface ContextOverrides {
  source?: IndexSource;
  /** Registered alongside the built-in workers */
  workers?: StarfleetWorker[];
  /** Used instead of opening `history.path`; left open on close */
  database?: SqliteDatabase;
}

export function createContext(config: StarfleetConfig, overrides: ContextOverrides = {}): CliContext {
  const index = new AccountIndex(overrides.source ?? new FileIndexSource(config.accountIndex.path));
  const registry = new WorkerRegistry([...builtinWorkers(), ...(overrides.workers ?? [])]);
  const engine = new StarfleetEngine({
    index,
    registry,
    definitions: buildWorkerDefinitions(config),
    queueConsumers: config.defaults.queueConsumers,
  });

  let owned: SqliteDatabase | undefined;
  let history: RunHistoryStore | undefined;
  if (config.history.enabled) {
    const db = overrides.database ?? openDatabase({ path: config.history.path });
    if (!overrides.database) owned = db;
    history = new RunHistoryStore(db);
  }

  return {
    config,
    index,
    registry,
    engine,
    history,
    close: () => owned?.close(),
  };
}

/**
 * Locate and load the configuration, then apply its log level
 * (STARFLEET_LOG_LEVEL wins over the file)
 */
export function loadContext(configPath?: string, env: NodeJS.ProcessEnv = process.env): CliContext {
  const resolved = findConfigPath(configPath, process.cwd(), env);
  if (!resolved) {
    throw new ConfigurationError(
      `No configuration file found. Pass --config or set ${CONFIG_ENV_VAR}`
    );
  }

  const config = loadConfig(resolved, env);
  setLogLevel(parseLogLevel(env[LOG_LEVEL_ENV_VAR]) ?? config.logLevel);
  return createContext(config);
}

export function requireHistory(ctx: CliContext): RunHistoryStore {
  if (!ctx.history) {
    throw new ConfigurationError('Run history is disabled in the configuration');
  }
  return ctx.history;
}

/**
 * Run a command body against a fresh context. The body's return value
 * becomes the exit code; any error is printed and exits 1.
 */
export async function withContext(
  configPath: string | undefined,
  body: (ctx: CliContext) => Promise<number>
): Promise<void> {
  let ctx: CliContext | undefined;
  try {
    ctx = loadContext(configPath);
    process.exitCode = await body(ctx);
  } catch (error) {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    process.exitCode = 1;
  } finally {
    ctx?.close();
  }
}
