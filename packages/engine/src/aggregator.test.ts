/**
 * Result Aggregator Tests
 */

import { describe, it, expect } from 'vitest';
import type { TargetOutcome, TargetStatus } from '@starfleet/common';
import { aggregate, describeFailure, summarize } from './aggregator.js';

function outcome(accountId: string, region: string, status: TargetStatus, attempts = 1, lastError?: string): TargetOutcome {
  return {
    target: { accountId, accountName: `acct-${accountId}`, region },
    status,
    attempts,
    ...(lastError !== undefined ? { lastError } : {}),
  };
}

describe('aggregate', () => {
  it('reports success for zero targets', () => {
    expect(aggregate([])).toEqual({
      status: 'success',
      totalTargets: 0,
      succeeded: 0,
      failed: 0,
      skipped: 0,
      failures: [],
    });
  });

  it('reports success when nothing failed', () => {
    const report = aggregate([outcome('1', 'us-east-1', 'succeeded'), outcome('2', 'us-east-1', 'skipped', 0)]);
    expect(report.status).toBe('success');
    expect(report.skipped).toBe(1);
  });

  it('reports partial failure when some targets succeeded', () => {
    const report = aggregate([
      outcome('2', 'us-east-1', 'failed-fatal', 1, 'AccessDenied'),
      outcome('1', 'us-east-1', 'succeeded'),
      outcome('1', 'eu-west-1', 'failed-retryable-exhausted', 3, 'Timeout'),
    ]);

    expect(report.status).toBe('partial-failure');
    expect(report.totalTargets).toBe(3);
    expect(report.succeeded).toBe(1);
    expect(report.failed).toBe(2);
    expect(report.failures.map(f => `${f.target.accountId}/${f.target.region}`)).toEqual([
      '1/eu-west-1',
      '2/us-east-1',
    ]);
  });

  it('reports failure when every target failed', () => {
    const report = aggregate([
      outcome('1', 'us-east-1', 'failed-fatal', 1, 'AccessDenied'),
      outcome('2', 'us-east-1', 'failed-retryable-exhausted', 3, 'Throttling'),
    ]);
    expect(report.status).toBe('failure');
  });

  it('does not depend on arrival order and is idempotent', () => {
    const outcomes = [
      outcome('3', 'us-east-1', 'succeeded'),
      outcome('1', 'us-east-1', 'failed-fatal', 1, 'AccessDenied'),
      outcome('2', 'us-west-2', 'failed-retryable-exhausted', 3, 'Timeout'),
    ];

    const first = aggregate(outcomes);
    expect(aggregate(outcomes)).toEqual(first);
    expect(aggregate([...outcomes].reverse())).toEqual(first);
  });

  it('rejects two outcomes for the same target', () => {
    expect(() =>
      aggregate([outcome('1', 'us-east-1', 'succeeded'), outcome('1', 'us-east-1', 'failed-fatal', 1, 'x')])
    ).toThrow('Duplicate outcome for 1/us-east-1');
  });
});

describe('summarize', () => {
  it('renders counts on one line', () => {
    const report = aggregate([
      outcome('1', 'us-east-1', 'succeeded'),
      outcome('2', 'us-east-1', 'failed-fatal', 1, 'AccessDenied'),
      outcome('3', 'us-east-1', 'skipped', 0, 'Cancelled'),
    ]);
    expect(summarize(report)).toBe('partial-failure: 1/3 succeeded, 1 failed, 1 skipped');
  });
});

describe('describeFailure', () => {
  it('names the target, status, attempts and cause', () => {
    expect(describeFailure(outcome('2', 'us-east-1', 'failed-retryable-exhausted', 3, 'Timeout'))).toBe(
      'acct-2 (2) us-east-1: failed-retryable-exhausted after 3 attempts: Timeout'
    );
    expect(describeFailure(outcome('2', 'us-east-1', 'failed-fatal', 1, 'AccessDenied'))).toBe(
      'acct-2 (2) us-east-1: failed-fatal after 1 attempt: AccessDenied'
    );
  });
});
