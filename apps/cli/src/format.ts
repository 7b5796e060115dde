/**
 * Terminal formatting shared by the commands
 */

import chalk from 'chalk';
import dayjs from 'dayjs';
import { formatDuration, type RunRecord, type RunStatus, type TargetOutcome, type TargetStatus } from '@starfleet/common';
import { describeFailure, summarize } from '@starfleet/engine';

type Colour = (text: string) => string;

const STATUS_WIDTH = 'failed-retryable-exhausted'.length;

export function runStatusColour(status: RunStatus): Colour {
  return {
    success: chalk.green,
    'partial-failure': chalk.yellow,
    failure: chalk.red,
  }[status];
}

export function targetStatusColour(status: TargetStatus): Colour {
  return {
    succeeded: chalk.green,
    skipped: chalk.gray,
    'failed-fatal': chalk.red,
    'failed-retryable-exhausted': chalk.red,
  }[status];
}

export function formatTimestamp(ms: number): string {
  return dayjs(ms).format('YYYY-MM-DD HH:mm:ss');
}

function attemptsLabel(attempts: number): string {
  return attempts === 1 ? '1 attempt' : `${attempts} attempts`;
}

export function formatOutcome(outcome: TargetOutcome): string {
  const { accountName, accountId, region } = outcome.target;
  const note = outcome.lastError ?? outcome.detail;
  return (
    targetStatusColour(outcome.status)(outcome.status.padEnd(STATUS_WIDTH)) +
    ` ${accountName} (${accountId}) ${region}  ${attemptsLabel(outcome.attempts)}` +
    (note ? chalk.gray(`  ${note}`) : '')
  );
}

/**
 * Summary block printed after a run and by `history show`
 */
export function printReport(record: RunRecord): void {
  const { report } = record;

  console.log(chalk.bold(`\nRun ${record.runId}`) + chalk.gray(` (${record.worker})`));
  console.log(`  ${runStatusColour(report.status)(summarize(report))}`);
  console.log(chalk.gray(`  Started ${formatTimestamp(record.startedAt)}, took ${formatDuration(record.finishedAt - record.startedAt)}`));

  if (record.dryRun) {
    console.log(chalk.yellow('  Dry run: no worker was invoked'));
  }
  if (record.cancelled) {
    console.log(chalk.yellow('  Cancelled before every target finished'));
  }

  if (report.failures.length > 0) {
    console.log(chalk.red(`\n  Failures (${report.failures.length}):`));
    for (const failure of report.failures) {
      console.log(`    ${describeFailure(failure)}`);
    }
  }
  console.log();
}
