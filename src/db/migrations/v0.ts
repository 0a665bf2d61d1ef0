/**
 * Migration v0: Base schema
 *
 * 最初のリリースのスキーマ（port_events.payload 追加前）。
 * 既存 v0 DB を再現するテストの基盤。
 */

import type Database from 'better-sqlite3';
import type { Migration } from './index.js';

const migration: Migration = {
  version: 0,
  description: 'Base schema (port_facts, port_events, port_annotations)',
  up(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS port_facts (
        id                    TEXT PRIMARY KEY,
        host_id               TEXT NOT NULL,
        protocol              TEXT NOT NULL CHECK (protocol IN ('tcp', 'udp')),
        port                  INTEGER NOT NULL CHECK (port BETWEEN 1 AND 65535),
        first_seen_at         TEXT NOT NULL,
        last_seen_at          TEXT NOT NULL,
        last_disappeared_at   TEXT,
        state                 TEXT NOT NULL CHECK (state IN ('active', 'disappeared')),
        pid                   INTEGER NOT NULL DEFAULT 0,
        process_name          TEXT NOT NULL DEFAULT '',
        command_line          TEXT NOT NULL DEFAULT '',
        total_seen_count      INTEGER NOT NULL DEFAULT 1,
        total_uptime_seconds  INTEGER NOT NULL DEFAULT 0,
        UNIQUE (host_id, protocol, port)
      );

      CREATE INDEX IF NOT EXISTS idx_port_facts_host ON port_facts(host_id);

      CREATE TABLE IF NOT EXISTS port_events (
        id            TEXT PRIMARY KEY,
        fact_id       TEXT NOT NULL,
        kind          TEXT NOT NULL,
        occurred_at   TEXT NOT NULL,
        pid           INTEGER NOT NULL DEFAULT 0,
        process_name  TEXT NOT NULL DEFAULT '',
        FOREIGN KEY (fact_id) REFERENCES port_facts(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_port_events_fact ON port_events(fact_id, occurred_at);

      CREATE TABLE IF NOT EXISTS port_annotations (
        id            TEXT PRIMARY KEY,
        host_id       TEXT NOT NULL,
        protocol      TEXT NOT NULL CHECK (protocol IN ('tcp', 'udp')),
        port          INTEGER NOT NULL CHECK (port BETWEEN 1 AND 65535),
        title         TEXT NOT NULL DEFAULT '',
        description   TEXT NOT NULL DEFAULT '',
        owner         TEXT NOT NULL DEFAULT '',
        risk_level    TEXT NOT NULL DEFAULT 'expected' CHECK (risk_level IN ('trusted', 'expected', 'suspicious')),
        is_pinned     INTEGER NOT NULL DEFAULT 0,
        created_at    TEXT NOT NULL,
        updated_at    TEXT NOT NULL,
        UNIQUE (host_id, protocol, port)
      );

      CREATE INDEX IF NOT EXISTS idx_port_annotations_host ON port_annotations(host_id);
    `);
  },
};

export default migration;
