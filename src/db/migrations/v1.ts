/**
 * Migration v1: Add port_events.payload
 *
 * This migration adds the payload column that carries the output of the
 * external diagnostic tool on `diagnosed` events.
 */

import type Database from 'better-sqlite3';
import type { Migration } from './index.js';

const migration: Migration = {
  version: 1,
  description: 'Add payload column to port_events',
  up(db: Database.Database): void {
    const columns = db.prepare('PRAGMA table_info(port_events)').all() as Array<{ name: string }>;
    if (columns.some((c) => c.name === 'payload')) {
      return;
    }
    db.exec('ALTER TABLE port_events ADD COLUMN payload TEXT');
  },
};

export default migration;
