/**
 * SQLite connection management
 *
 * Opens a better-sqlite3 database with WAL and foreign keys enabled and
 * brings its schema up to date. Each caller owns the handle it opens.
 */

import Database from 'better-sqlite3';
import { dirname } from 'node:path';
import { mkdirSync, existsSync } from 'node:fs';
import { IN_MEMORY_DATABASE } from '@starfleet/common';
import { runMigrations } from './migrations.js';

export const IN_MEMORY = IN_MEMORY_DATABASE;

export interface DatabaseOptions {
  /** File path, or `:memory:` */
  path?: string;
  inMemory?: boolean;
  verbose?: boolean;
}

export type SqliteDatabase = Database.Database;

export function openDatabase(options: DatabaseOptions = {}): SqliteDatabase {
  const dbPath = options.inMemory || !options.path ? IN_MEMORY : options.path;

  if (dbPath !== IN_MEMORY) {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath, {
    verbose: options.verbose ? console.log : undefined,
  });

  // WAL lets the CLI read history while a run is writing
  if (dbPath !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');

  runMigrations(db);
  return db;
}
