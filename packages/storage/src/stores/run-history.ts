/**
 * Run History Store
 *
 * Persists finished RunRecords so past runs can be listed and inspected.
 */

import {
  StarfleetError,
  compareStrings,
  type RunRecord,
  type RunStatus,
  type TargetOutcome,
  type TargetStatus,
} from '@starfleet/common';
import type { SqliteDatabase } from '../database.js';

export interface RunSummary {
  runId: string;
  worker: string;
  status: RunStatus;
  startedAt: number;
  finishedAt: number;
  cancelled: boolean;
  dryRun: boolean;
  totalTargets: number;
  succeeded: number;
  failed: number;
  skipped: number;
}

export interface ListRunsOptions {
  worker?: string;
  limit?: number;
  offset?: number;
}

interface RunRow {
  run_id: string;
  worker: string;
  status: string;
  started_at: number;
  finished_at: number;
  cancelled: number;
  dry_run: number;
  total_targets: number;
  succeeded: number;
  failed: number;
  skipped: number;
}

interface OutcomeRow {
  account_id: string;
  account_name: string;
  region: string;
  status: string;
  attempts: number;
  last_error: string | null;
  detail: string | null;
}

const RUN_STATUSES: readonly RunStatus[] = ['success', 'partial-failure', 'failure'];
const TARGET_STATUSES: readonly TargetStatus[] = [
  'succeeded',
  'failed-retryable-exhausted',
  'failed-fatal',
  'skipped',
];

function parseRunStatus(value: string, runId: string): RunStatus {
  const status = RUN_STATUSES.find(s => s === value);
  if (!status) {
    throw new StarfleetError(`Run ${runId} has unknown status '${value}'`, 'CORRUPT_HISTORY', { runId });
  }
  return status;
}

function parseTargetStatus(value: string, runId: string): TargetStatus {
  const status = TARGET_STATUSES.find(s => s === value);
  if (!status) {
    throw new StarfleetError(`Run ${runId} has an outcome with unknown status '${value}'`, 'CORRUPT_HISTORY', {
      runId,
    });
  }
  return status;
}

function isFailure(outcome: TargetOutcome): boolean {
  return outcome.status === 'failed-fatal' || outcome.status === 'failed-retryable-exhausted';
}

export class RunHistoryStore {
  constructor(private readonly db: SqliteDatabase) {}

  /**
   * Insert a finished run. Saving the same runId twice replaces it.
   */
  save(record: RunRecord): void {
    const insertRun = this.db.prepare(`
      INSERT OR REPLACE INTO runs (
        run_id, worker, status, started_at, finished_at, cancelled, dry_run,
        total_targets, succeeded, failed, skipped
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertOutcome = this.db.prepare(`
      INSERT INTO run_outcomes (
        run_id, position, account_id, account_name, region, status, attempts, last_error, detail
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    this.db.transaction(() => {
      this.db.prepare('DELETE FROM run_outcomes WHERE run_id = ?').run(record.runId);
      insertRun.run(
        record.runId,
        record.worker,
        record.report.status,
        record.startedAt,
        record.finishedAt,
        record.cancelled ? 1 : 0,
        record.dryRun ? 1 : 0,
        record.report.totalTargets,
        record.report.succeeded,
        record.report.failed,
        record.report.skipped
      );
      record.outcomes.forEach((outcome, position) => {
        insertOutcome.run(
          record.runId,
          position,
          outcome.target.accountId,
          outcome.target.accountName,
          outcome.target.region,
          outcome.status,
          outcome.attempts,
          outcome.lastError ?? null,
          outcome.detail ?? null
        );
      });
    })();
  }

  get(runId: string): RunRecord | undefined {
    const row = this.db
      .prepare<[string], RunRow>('SELECT * FROM runs WHERE run_id = ?')
      .get(runId);
    if (!row) return undefined;

    const outcomes = this.db
      .prepare<[string], OutcomeRow>(`
        SELECT account_id, account_name, region, status, attempts, last_error, detail
        FROM run_outcomes
        WHERE run_id = ?
        ORDER BY position
      `)
      .all(runId)
      .map(outcome => this.rowToOutcome(outcome, runId));

    const summary = this.rowToSummary(row);
    const failures = outcomes
      .filter(isFailure)
      .sort((a, b) => compareStrings(a.target.accountId, b.target.accountId) || compareStrings(a.target.region, b.target.region));

    return {
      runId: summary.runId,
      worker: summary.worker,
      startedAt: summary.startedAt,
      finishedAt: summary.finishedAt,
      cancelled: summary.cancelled,
      dryRun: summary.dryRun,
      report: {
        status: summary.status,
        totalTargets: summary.totalTargets,
        succeeded: summary.succeeded,
        failed: summary.failed,
        skipped: summary.skipped,
        failures,
      },
      outcomes,
    };
  }

  /**
   * Most recent runs first
   */
  list(options: ListRunsOptions = {}): RunSummary[] {
    const { worker, limit = 20, offset = 0 } = options;

    const rows = worker
      ? this.db
          .prepare<[string, number, number], RunRow>(`
            SELECT * FROM runs
            WHERE worker = ?
            ORDER BY started_at DESC, run_id
            LIMIT ? OFFSET ?
          `)
          .all(worker, limit, offset)
      : this.db
          .prepare<[number, number], RunRow>(`
            SELECT * FROM runs
            ORDER BY started_at DESC, run_id
            LIMIT ? OFFSET ?
          `)
          .all(limit, offset);

    return rows.map(row => this.rowToSummary(row));
  }

  count(worker?: string): number {
    const row = worker
      ? this.db.prepare<[string], { total: number }>('SELECT COUNT(*) AS total FROM runs WHERE worker = ?').get(worker)
      : this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM runs').get();
    return row?.total ?? 0;
  }

  delete(runId: string): boolean {
    const result = this.db.prepare('DELETE FROM runs WHERE run_id = ?').run(runId);
    return result.changes > 0;
  }

  /**
   * Delete old runs, keeping only the latest N per worker
   */
  prune(keepPerWorker: number): number {
    const workers = this.db
      .prepare<[], { worker: string }>('SELECT DISTINCT worker FROM runs')
      .all();

    let deleted = 0;
    const remove = this.db.prepare<[string, string, number]>(`
      DELETE FROM runs
      WHERE worker = ?
      AND run_id NOT IN (
        SELECT run_id FROM runs WHERE worker = ? ORDER BY started_at DESC, run_id LIMIT ?
      )
    `);

    this.db.transaction(() => {
      for (const { worker } of workers) {
        deleted += remove.run(worker, worker, Math.max(0, keepPerWorker)).changes;
      }
    })();

    return deleted;
  }

  private rowToSummary(row: RunRow): RunSummary {
    return {
      runId: row.run_id,
      worker: row.worker,
      status: parseRunStatus(row.status, row.run_id),
      startedAt: row.started_at,
      finishedAt: row.finished_at,
      cancelled: row.cancelled === 1,
      dryRun: row.dry_run === 1,
      totalTargets: row.total_targets,
      succeeded: row.succeeded,
      failed: row.failed,
      skipped: row.skipped,
    };
  }

  private rowToOutcome(row: OutcomeRow, runId: string): TargetOutcome {
    return {
      target: { accountId: row.account_id, accountName: row.account_name, region: row.region },
      status: parseTargetStatus(row.status, runId),
      attempts: row.attempts,
      ...(row.last_error !== null ? { lastError: row.last_error } : {}),
      ...(row.detail !== null ? { detail: row.detail } : {}),
    };
  }
}
