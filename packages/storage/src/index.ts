/**
 * @starfleet/storage - SQLite run history
 */

export { openDatabase, IN_MEMORY } from './database.js';
export type { DatabaseOptions, SqliteDatabase } from './database.js';

export * from './stores/index.js';
export { runMigrations, getSchemaVersion, LATEST_SCHEMA_VERSION } from './migrations.js';
