/**
 * Result Aggregator
 *
 * Pure reduction of terminal outcomes into a RunReport. Outcomes are keyed
 * by target, never by arrival order.
 */

import {
  StarfleetError,
  type RunReport,
  type RunStatus,
  type TargetOutcome,
} from '@starfleet/common';
import { compareTargetRefs, targetKey } from './targeting.js';

function isFailure(outcome: TargetOutcome): boolean {
  return outcome.status === 'failed-fatal' || outcome.status === 'failed-retryable-exhausted';
}

export function aggregate(outcomes: Iterable<TargetOutcome>): RunReport {
  const byTarget = new Map<string, TargetOutcome>();
  for (const outcome of outcomes) {
    const key = targetKey(outcome.target);
    if (byTarget.has(key)) {
      throw new StarfleetError(`Duplicate outcome for ${key}`, 'DUPLICATE_OUTCOME', { target: key });
    }
    byTarget.set(key, outcome);
  }

  let succeeded = 0;
  let skipped = 0;
  const failures: TargetOutcome[] = [];
  for (const outcome of byTarget.values()) {
    if (outcome.status === 'succeeded') succeeded++;
    else if (outcome.status === 'skipped') skipped++;
    else if (isFailure(outcome)) failures.push(outcome);
  }
  failures.sort((a, b) => compareTargetRefs(a.target, b.target));

  let status: RunStatus;
  if (failures.length === 0) {
    status = 'success';
  } else if (succeeded > 0) {
    status = 'partial-failure';
  } else {
    status = 'failure';
  }

  return {
    status,
    totalTargets: byTarget.size,
    succeeded,
    failed: failures.length,
    skipped,
    failures,
  };
}

/**
 * One-line summary, e.g. `partial-failure: 3/4 succeeded, 1 failed, 0 skipped`
 */
export function summarize(report: RunReport): string {
  return (
    `${report.status}: ${report.succeeded}/${report.totalTargets} succeeded, ` +
    `${report.failed} failed, ${report.skipped} skipped`
  );
}

export function describeFailure(outcome: TargetOutcome): string {
  const { accountName, accountId, region } = outcome.target;
  const attempts = outcome.attempts === 1 ? '1 attempt' : `${outcome.attempts} attempts`;
  return `${accountName} (${accountId}) ${region}: ${outcome.status} after ${attempts}: ${outcome.lastError ?? 'unknown error'}`;
}
