/**
 * Validation Schema Tests
 */

import { describe, it, expect } from 'vitest';
import {
  accountIdSchema,
  workerNameSchema,
  targetingRuleSchema,
  retryPolicySchema,
  workerConfigSchema,
  starfleetConfigSchema,
  validateInput,
  MAX_TIMER_MS,
} from './validation.js';

describe('accountIdSchema', () => {
  it('accepts valid account IDs', () => {
    expect(accountIdSchema.parse('000000000001')).toBe('000000000001');
    expect(accountIdSchema.parse('sub_account-2')).toBe('sub_account-2');
  });

  it('rejects empty and malformed IDs', () => {
    expect(() => accountIdSchema.parse('')).toThrow();
    expect(() => accountIdSchema.parse('acct 1')).toThrow();
  });
});

describe('workerNameSchema', () => {
  it('accepts valid names', () => {
    expect(workerNameSchema.parse('echo')).toBe('echo');
    expect(workerNameSchema.parse('Config_Worker-2')).toBe('Config_Worker-2');
  });

  it('rejects names starting with a number', () => {
    expect(() => workerNameSchema.parse('2fast')).toThrow();
  });
});

describe('targetingRuleSchema', () => {
  it('applies defaults', () => {
    const rule = targetingRuleSchema.parse({
      include: { allAccounts: true },
      includeRegions: ['ALL'],
    });

    expect(rule.exclude).toEqual({});
    expect(rule.excludeRegions).toEqual([]);
    expect(rule.operateInOrgRoot).toBe(false);
  });

  it('rejects an include filter that selects nothing', () => {
    const result = validateInput(targetingRuleSchema, {
      include: { byIds: [] },
      includeRegions: ['us-east-1'],
    });

    expect(result).toEqual({
      success: false,
      error: 'include: Include filter must select at least one account',
    });
  });

  it('rejects ALL mixed with explicit regions', () => {
    const result = validateInput(targetingRuleSchema, {
      include: { allAccounts: true },
      includeRegions: ['ALL', 'us-east-1'],
    });

    expect(result).toEqual({
      success: false,
      error: "includeRegions: Can't specify any other regions when `ALL` is specified in the list",
    });
  });

  it('does not allow allAccounts in the exclude filter', () => {
    const result = targetingRuleSchema.safeParse({
      include: { allAccounts: true },
      exclude: { allAccounts: true },
      includeRegions: ['ALL'],
    });

    expect(result.success).toBe(false);
  });

  it('rejects unknown keys', () => {
    const result = targetingRuleSchema.safeParse({
      include: { byAliases: ['prod'] },
      includeRegions: ['ALL'],
    });

    expect(result.success).toBe(false);
  });
});

describe('retryPolicySchema', () => {
  it('fills every field with a default', () => {
    expect(retryPolicySchema.parse({})).toEqual({
      maxAttempts: 3,
      baseDelayMs: 1000,
      maxDelayMs: 30000,
      backoff: 'exponential',
      jitter: 'full',
    });
  });

  it('rejects zero attempts', () => {
    expect(() => retryPolicySchema.parse({ maxAttempts: 0 })).toThrow();
  });

  it('rejects delays past the timer limit', () => {
    expect(retryPolicySchema.safeParse({ maxDelayMs: MAX_TIMER_MS }).success).toBe(true);
    expect(retryPolicySchema.safeParse({ maxDelayMs: MAX_TIMER_MS + 1 }).success).toBe(false);
    expect(retryPolicySchema.safeParse({ baseDelayMs: 3_000_000_000 }).success).toBe(false);
  });
});

describe('workerConfigSchema', () => {
  it('keeps configuration opaque', () => {
    const worker = workerConfigSchema.parse({
      targeting: { include: { byTags: [{ name: 'env', value: 'prod' }] }, includeRegions: ['us-east-1'] },
      configuration: { nested: { list: [1, 2, 3] } },
    });

    expect(worker.configuration).toEqual({ nested: { list: [1, 2, 3] } });
    expect(worker.enabled).toBe(true);
  });
});

describe('starfleetConfigSchema', () => {
  it('applies nested defaults', () => {
    const config = starfleetConfigSchema.parse({ accountIndex: { path: 'index.json' } });

    expect(config.logLevel).toBe('info');
    expect(config.history).toEqual({ enabled: true, path: './.starfleet/history.db' });
    expect(config.defaults.concurrency).toBe(10);
    expect(config.defaults.retry.maxAttempts).toBe(3);
    expect(config.workers).toEqual({});
  });

  it('rejects timeouts past the timer limit', () => {
    const worker = {
      timeoutMs: 3_000_000_000,
      targeting: { include: { allAccounts: true }, includeRegions: ['us-east-1'] },
    };

    expect(workerConfigSchema.safeParse(worker).success).toBe(false);
    expect(starfleetConfigSchema.safeParse({
      accountIndex: { path: 'index.json' },
      defaults: { timeoutMs: 3_000_000_000 },
    }).success).toBe(false);
    expect(starfleetConfigSchema.safeParse({
      accountIndex: { path: 'index.json' },
      defaults: { timeoutMs: MAX_TIMER_MS },
    }).success).toBe(true);
  });

  it('requires the account index location', () => {
    expect(starfleetConfigSchema.safeParse({}).success).toBe(false);
  });
});
