/**
 * Configuration Loader
 *
 * Loads the Starfleet YAML configuration, substitutes `${ENV_VAR}`
 * references, and validates the result.
 */

import fs from 'node:fs';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError, errorMessage } from './errors.js';
import { createLogger } from './logger.js';
import { formatZodError, starfleetConfigSchema, type StarfleetConfig } from './validation.js';

const log = createLogger('Config');

export const CONFIG_ENV_VAR = 'STARFLEET_CONFIG';

/** SQLite's name for a database that lives only in memory */
export const IN_MEMORY_DATABASE = ':memory:';

export const DEFAULT_CONFIG_FILES = [
  'starfleet.yaml',
  'starfleet.yml',
  path.join('config', 'starfleet.yaml'),
  path.join('config', 'starfleet.yml'),
];

const ENV_REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Replace `${VAR}` references in every string of a parsed document
 */
export function substituteEnv(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_REFERENCE, (_match, name: string) => env[name] ?? '');
  }
  if (Array.isArray(value)) {
    return value.map(item => substituteEnv(item, env));
  }
  if (typeof value === 'object' && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = substituteEnv(item, env);
    }
    return result;
  }
  return value;
}

/**
 * Validate an already-parsed configuration document
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): StarfleetConfig {
  const result = starfleetConfigSchema.safeParse(substituteEnv(raw ?? {}, env));
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatZodError(result.error)}`, {
      issues: result.error.errors,
    });
  }
  return result.data;
}

/**
 * Find the configuration file: explicit path, then STARFLEET_CONFIG, then defaults under cwd
 */
export function findConfigPath(
  explicitPath?: string,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  if (explicitPath) return path.resolve(cwd, explicitPath);
  const fromEnv = env[CONFIG_ENV_VAR];
  if (fromEnv) return path.resolve(cwd, fromEnv);

  for (const candidate of DEFAULT_CONFIG_FILES) {
    const fullPath = path.join(cwd, candidate);
    if (fs.existsSync(fullPath)) return fullPath;
  }
  return undefined;
}

/**
 * Load and validate configuration from file.
 * Relative paths inside the file (index, history) are resolved against its
 * directory; a history path of `:memory:` is kept as is.
 */
export function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): StarfleetConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigurationError(`Configuration file not found: ${configPath}`, { path: configPath });
  }

  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Unable to parse ${configPath}: ${errorMessage(error)}`, {
      path: configPath,
    });
  }

  const config = parseConfig(raw, env);
  const baseDir = path.dirname(configPath);
  config.accountIndex.path = path.resolve(baseDir, config.accountIndex.path);
  if (config.history.path !== IN_MEMORY_DATABASE) {
    config.history.path = path.resolve(baseDir, config.history.path);
  }

  log.debug(`Loaded configuration from: ${configPath}`, {
    workers: Object.keys(config.workers).length,
  });

  return config;
}
