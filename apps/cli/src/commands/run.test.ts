/**
 * Run Command Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { Command } from 'commander';
import { setLogHandler } from '@starfleet/common';

const spinner = vi.hoisted(() => ({
  text: '',
  start: vi.fn().mockReturnThis(),
  succeed: vi.fn().mockReturnThis(),
  fail: vi.fn().mockReturnThis(),
  warn: vi.fn().mockReturnThis(),
}));

vi.mock('chalk', () => ({
  default: {
    bold: (s: string) => s,
    cyan: (s: string) => s,
    gray: (s: string) => s,
    yellow: (s: string) => s,
    green: (s: string) => s,
    red: (s: string) => s,
  },
}));

vi.mock('ora', () => ({
  default: vi.fn(() => spinner),
}));

import ora from 'ora';
import { CANCELLED_EXIT_CODE, executeRun, runCommand } from './run.js';
import { printedLines, testContext, type TestContext } from '../test-helpers.js';

describe('Run Command', () => {
  describe('Command Structure', () => {
    let run: Command;

    beforeEach(() => {
      run = runCommand();
    });

    it('creates run command', () => {
      expect(run.name()).toBe('run');
      expect(run.description()).toBe('Run a worker against every target its rule resolves');
    });

    it('has targeting and output options', () => {
      const options = run.options.map(o => o.long);
      expect(options).toEqual(['--account', '--region', '--dry-run', '--no-history', '--json', '--config']);
    });

    it('accepts several accounts', () => {
      const account = run.options.find(o => o.long === '--account');
      expect(account?.variadic).toBe(true);
    });
  });

  describe('executeRun()', () => {
    let test: TestContext;
    let logSpy: MockInstance<typeof console.log>;
    let errorSpy: MockInstance<typeof console.error>;

    beforeEach(() => {
      vi.clearAllMocks();
      setLogHandler(() => {});
      logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      test = testContext();
    });

    afterEach(() => {
      test.ctx.close();
      test.db.close();
      logSpy.mockRestore();
      errorSpy.mockRestore();
      setLogHandler(null);
    });

    it('exits 0 and prints the summary when every target succeeds', async () => {
      const code = await executeRun(test.ctx, 'echo', {});

      expect(code).toBe(0);
      expect(spinner.succeed).toHaveBeenCalledWith('"echo" finished: success');
      expect(printedLines(logSpy.mock.calls)).toContain('  success: 3/3 succeeded, 0 failed, 0 skipped');
    });

    it('records the run in history', async () => {
      await executeRun(test.ctx, 'echo', {});

      const [run] = test.ctx.history?.list() ?? [];
      expect(run).toMatchObject({ worker: 'echo', status: 'success', totalTargets: 3 });
    });

    it('skips history with --no-history', async () => {
      await executeRun(test.ctx, 'echo', { history: false });

      expect(test.ctx.history?.count()).toBe(0);
    });

    it('exits 1 and lists every failing target on partial failure', async () => {
      const code = await executeRun(test.ctx, 'flaky', {});

      expect(code).toBe(1);
      expect(spinner.warn).toHaveBeenCalledWith('"flaky" finished: partial-failure');
      const lines = printedLines(logSpy.mock.calls);
      expect(lines).toContain('  partial-failure: 2/3 succeeded, 1 failed, 0 skipped');
      expect(lines).toContain('    prod-b (333333333333) eu-west-1: failed-fatal after 1 attempt: AccessDenied');
    });

    it('applies account and region overrides', async () => {
      const code = await executeRun(test.ctx, 'flaky', { account: ['prod-a'], region: ['us-east-1'] });

      expect(code).toBe(0);
      expect(printedLines(logSpy.mock.calls)).toContain('  success: 1/1 succeeded, 0 failed, 0 skipped');
    });

    it('prints the run record as JSON without a spinner', async () => {
      const code = await executeRun(test.ctx, 'echo', { json: true });

      expect(code).toBe(0);
      expect(ora).not.toHaveBeenCalled();
      const record = JSON.parse(String(logSpy.mock.calls[0][0]));
      expect(record.worker).toBe('echo');
      expect(record.report.succeeded).toBe(3);
    });

    it('reports a dry run as success', async () => {
      const code = await executeRun(test.ctx, 'flaky', { dryRun: true });

      expect(code).toBe(0);
      const lines = printedLines(logSpy.mock.calls);
      expect(lines).toContain('  success: 0/3 succeeded, 0 failed, 3 skipped');
      expect(lines).toContain('  Dry run: no worker was invoked');
    });

    it('fails the spinner when the worker is unknown', async () => {
      const code = await executeRun(test.ctx, 'ghost', {});

      expect(code).toBe(1);
      expect(spinner.fail).toHaveBeenCalledWith('Run of "ghost" failed: Worker \'ghost\' not found');
    });

    it('prints resolution errors to stderr in JSON mode', async () => {
      const code = await executeRun(test.ctx, 'ghost', { json: true });

      expect(code).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith("Error: Worker 'ghost' not found");
    });

    it('exits 130 for a cancelled run', async () => {
      const controller = new AbortController();
      controller.abort();

      const code = await executeRun(test.ctx, 'echo', {}, controller.signal);

      expect(code).toBe(CANCELLED_EXIT_CODE);
      expect(CANCELLED_EXIT_CODE).toBe(130);
      expect(printedLines(logSpy.mock.calls)).toContain('  Cancelled before every target finished');
    });
  });
});
