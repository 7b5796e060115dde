/**
 * Database Migrations
 *
 * Manages schema versioning and upgrades.
 */

import type Database from 'better-sqlite3';
import { createLogger } from '@starfleet/common';

const log = createLogger('Storage');

interface Migration {
  version: number;
  name: string;
  up: string;
}

const migrations: Migration[] = [
  {
    version: 1,
    name: 'run_history',
    up: `
      CREATE TABLE IF NOT EXISTS runs (
        run_id TEXT PRIMARY KEY,
        worker TEXT NOT NULL,
        status TEXT NOT NULL,
        started_at INTEGER NOT NULL,
        finished_at INTEGER NOT NULL,
        cancelled INTEGER NOT NULL DEFAULT 0,
        dry_run INTEGER NOT NULL DEFAULT 0,
        total_targets INTEGER NOT NULL,
        succeeded INTEGER NOT NULL,
        failed INTEGER NOT NULL,
        skipped INTEGER NOT NULL
      );

      -- One row per target, in the order the run resolved them
      CREATE TABLE IF NOT EXISTS run_outcomes (
        run_id TEXT NOT NULL,
        position INTEGER NOT NULL,
        account_id TEXT NOT NULL,
        account_name TEXT NOT NULL,
        region TEXT NOT NULL,
        status TEXT NOT NULL,
        attempts INTEGER NOT NULL,
        last_error TEXT,
        detail TEXT,
        PRIMARY KEY (run_id, position),
        UNIQUE (run_id, account_id, region),
        FOREIGN KEY (run_id) REFERENCES runs(run_id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_runs_worker ON runs(worker, started_at DESC);
      CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at DESC);
    `,
  },
  {
    version: 2,
    name: 'outcome_status_index',
    up: `
      CREATE INDEX IF NOT EXISTS idx_run_outcomes_status ON run_outcomes(run_id, status);
    `,
  },
];

export const LATEST_SCHEMA_VERSION = migrations[migrations.length - 1].version;

/**
 * Run all pending migrations
 */
export function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at INTEGER DEFAULT (strftime('%s', 'now'))
    )
  `);

  const version = getSchemaVersion(db);

  for (const migration of migrations) {
    if (migration.version > version) {
      db.transaction(() => {
        db.exec(migration.up);
        db.prepare('INSERT INTO migrations (version, name) VALUES (?, ?)').run(
          migration.version,
          migration.name
        );
      })();

      log.debug(`Applied migration ${migration.version}: ${migration.name}`);
    }
  }
}

/**
 * Get the current schema version
 */
export function getSchemaVersion(db: Database.Database): number {
  const result = db
    .prepare<[], { version: number | null }>('SELECT MAX(version) as version FROM migrations')
    .get();
  return result?.version ?? 0;
}
