import type Database from 'better-sqlite3';
import { SCHEMA_SQL } from './schema.js';
import {
  getSchemaVersion,
  setSchemaVersion,
  runMigrations,
  LATEST_VERSION,
} from './migrations/index.js';

function countTables(db: Database.Database): number {
  const row = db
    .prepare(
      "SELECT COUNT(*) AS cnt FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'",
    )
    .get() as { cnt: number };
  return row.cnt;
}

/**
 * Migrate the database to the latest schema version.
 *
 * - New database (user_version = 0, no tables): runs full schema SQL and sets version.
 * - Existing database (user_version < LATEST_VERSION, has tables): runs incremental migrations.
 * - Already up-to-date: re-runs the idempotent schema SQL only.
 */
export function migrateDatabase(db: Database.Database): void {
  db.pragma('foreign_keys = ON');

  const currentVersion = getSchemaVersion(db);

  if (currentVersion >= LATEST_VERSION) {
    db.exec(SCHEMA_SQL);
    return;
  }

  if (currentVersion === 0 && countTables(db) === 0) {
    db.exec(SCHEMA_SQL);
    setSchemaVersion(db, LATEST_VERSION);
    return;
  }

  runMigrations(db, currentVersion);
}
