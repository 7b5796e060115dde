/**
 * Shared fixtures for engine tests
 */

import { AccountIndex, StaticIndexSource } from '@starfleet/account-index';
import type { ExecutionResult, InvocationPayload, Target, WorkerDefinition } from '@starfleet/common';
import type { ExecutionContext, StarfleetWorker } from './worker.js';

export const TEST_ACCOUNTS = [
  {
    id: '111111111111',
    name: 'prod-a',
    regions: ['us-west-2', 'us-east-1'],
    tags: { env: 'prod' },
    orgUnits: [{ id: 'r-root', name: 'Root' }, { id: 'ou-prod', name: 'Production' }],
  },
  {
    id: '222222222222',
    name: 'dev-a',
    regions: ['us-east-1'],
    tags: { env: 'dev' },
    orgUnits: [{ id: 'r-root', name: 'Root' }, { id: 'ou-dev', name: 'Development' }],
  },
  {
    id: '333333333333',
    name: 'prod-b',
    regions: ['us-east-1', 'eu-west-1'],
    tags: { env: 'prod' },
    orgUnits: [{ id: 'r-root', name: 'Root' }, { id: 'ou-prod', name: 'Production' }],
  },
  {
    id: '444444444444',
    name: 'prod-c',
    regions: ['us-east-1'],
    tags: { env: 'prod', team: 'payments' },
    orgUnits: [{ id: 'r-root', name: 'Root' }, { id: 'ou-prod', name: 'Production' }],
  },
  {
    id: '999999999999',
    name: 'org-root',
    regions: ['us-east-1'],
    tags: { env: 'prod' },
    accountType: 'management',
    orgUnits: [{ id: 'r-root', name: 'Root' }],
  },
];

export async function loadTestIndex(records: unknown = TEST_ACCOUNTS): Promise<AccountIndex> {
  const index = new AccountIndex(new StaticIndexSource(records, 'test-index'));
  await index.load();
  return index;
}

export function testDefinition(overrides: Partial<WorkerDefinition> = {}): WorkerDefinition {
  return {
    name: 'scanner',
    targeting: {
      include: { byTags: [{ name: 'env', value: 'prod' }] },
      includeRegions: ['ALL'],
    },
    configuration: { bucket: 'test-bucket' },
    invocationMode: 'synchronous',
    concurrency: 10,
    timeoutMs: 1000,
    retry: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, backoff: 'fixed', jitter: 'none' },
    ...overrides,
  };
}

export function testTarget(index: AccountIndex, accountId: string, region: string): Target {
  const account = index.get(accountId);
  if (!account) {
    throw new Error(`No test account ${accountId}`);
  }
  return { account, region };
}

export function scriptedWorker(
  name: string,
  execute: (payload: InvocationPayload, context: ExecutionContext) => Promise<ExecutionResult>
): StarfleetWorker {
  return { name, execute };
}
