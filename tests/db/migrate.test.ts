/**
 * portmemo — Migration tests
 */

import { describe, it, expect } from 'vitest';
import Database from 'better-sqlite3';
import crypto from 'node:crypto';
import { migrateDatabase } from '../../src/db/migrate.js';
import { getSchemaVersion, LATEST_VERSION } from '../../src/db/migrations/index.js';
import v0 from '../../src/db/migrations/v0.js';

function tableNames(db: InstanceType<typeof Database>): string[] {
  const rows = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'")
    .all() as Array<{ name: string }>;
  return rows.map((r) => r.name).sort();
}

function columnNames(db: InstanceType<typeof Database>, table: string): string[] {
  const rows = db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>;
  return rows.map((r) => r.name);
}

describe('migrateDatabase', () => {
  it('新規 DB に全テーブルを作成し最新バージョンを設定する', () => {
    const db = new Database(':memory:');
    migrateDatabase(db);

    expect(tableNames(db)).toEqual(['port_annotations', 'port_events', 'port_facts']);
    expect(getSchemaVersion(db)).toBe(LATEST_VERSION);
    expect(LATEST_VERSION).toBe(1);
    expect(columnNames(db, 'port_events')).toContain('payload');
  });

  it('2 回実行しても壊れない', () => {
    const db = new Database(':memory:');
    migrateDatabase(db);
    migrateDatabase(db);

    expect(getSchemaVersion(db)).toBe(1);
    expect(tableNames(db)).toHaveLength(3);
  });

  it('foreign_keys を有効にする', () => {
    const db = new Database(':memory:');
    migrateDatabase(db);

    expect(db.pragma('foreign_keys', { simple: true })).toBe(1);
  });

  it('v0 DB に payload 列を追加し既存データを保持する', () => {
    const db = new Database(':memory:');
    v0.up(db);
    const factId = crypto.randomUUID();
    const ts = '2026-01-01T00:00:00.000Z';
    db.prepare(
      `INSERT INTO port_facts (id, host_id, protocol, port, first_seen_at, last_seen_at, state)
       VALUES (?, 'local', 'tcp', 22, ?, ?, 'active')`,
    ).run(factId, ts, ts);
    db.prepare(
      `INSERT INTO port_events (id, fact_id, kind, occurred_at) VALUES (?, ?, 'appeared', ?)`,
    ).run(crypto.randomUUID(), factId, ts);

    expect(columnNames(db, 'port_events')).not.toContain('payload');

    migrateDatabase(db);

    expect(getSchemaVersion(db)).toBe(1);
    expect(columnNames(db, 'port_events')).toContain('payload');
    const row = db.prepare('SELECT kind, payload FROM port_events').get() as {
      kind: string;
      payload: string | null;
    };
    expect(row).toEqual({ kind: 'appeared', payload: null });
  });

  it('protocol / port / state の CHECK 制約が効く', () => {
    const db = new Database(':memory:');
    migrateDatabase(db);
    const insert = db.prepare(
      `INSERT INTO port_facts (id, host_id, protocol, port, first_seen_at, last_seen_at, state)
       VALUES (?, 'local', ?, ?, 'x', 'x', ?)`,
    );

    expect(() => insert.run('a', 'icmp', 22, 'active')).toThrow();
    expect(() => insert.run('b', 'tcp', 0, 'active')).toThrow();
    expect(() => insert.run('c', 'tcp', 65536, 'active')).toThrow();
    expect(() => insert.run('d', 'tcp', 22, 'flapping')).toThrow();
    expect(() => insert.run('e', 'tcp', 22, 'active')).not.toThrow();
  });
});
