/**
 * Shared fixtures for CLI tests
 */

import { StaticIndexSource, type IndexSource } from '@starfleet/account-index';
import { parseConfig, type StarfleetConfig } from '@starfleet/common';
import { fatalFailure, succeeded, type StarfleetWorker } from '@starfleet/engine';
import { openDatabase, type SqliteDatabase } from '@starfleet/storage';
import { createContext, type CliContext } from './context.js';

export const CLI_ACCOUNTS = [
  { id: '111111111111', name: 'prod-a', regions: ['us-west-2', 'us-east-1'], tags: { env: 'prod' } },
  { id: '222222222222', name: 'dev-a', regions: ['us-east-1'], tags: { env: 'dev' } },
  { id: '333333333333', name: 'prod-b', regions: ['eu-west-1'], tags: { env: 'prod' } },
];

const prodRule = {
  include: { byTags: [{ name: 'env', value: 'prod' }] },
  includeRegions: ['ALL'],
};

export function testConfig(workers: Record<string, unknown> = {}): StarfleetConfig {
  return parseConfig(
    {
      accountIndex: { path: 'accounts.json' },
      defaults: { retry: { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0, jitter: 'none' } },
      workers: {
        echo: { description: 'Reports each target', concurrency: 2, timeoutMs: 5000, targeting: prodRule },
        flaky: { targeting: prodRule },
        ...workers,
      },
    },
    {}
  );
}

/** Fails fatally in eu-west-1, succeeds everywhere else */
export const flakyWorker: StarfleetWorker = {
  name: 'flaky',
  async execute(payload) {
    return payload.region === 'eu-west-1' ? fatalFailure('AccessDenied') : succeeded();
  },
};

export interface TestContext {
  ctx: CliContext;
  db: SqliteDatabase;
}

export function testContext(
  config: StarfleetConfig = testConfig(),
  source: IndexSource = new StaticIndexSource(CLI_ACCOUNTS, 'test-index')
): TestContext {
  const db = openDatabase({ inMemory: true });
  const ctx = createContext(config, {
    source,
    workers: [flakyWorker],
    database: db,
  });
  return { ctx, db };
}

/** Every console line as printed, with no-arg calls as empty strings */
export function printedLines(calls: unknown[][]): string[] {
  return calls.map(args => (args.length > 0 ? String(args[0]) : ''));
}
