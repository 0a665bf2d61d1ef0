import type Database from 'better-sqlite3';
import crypto from 'node:crypto';
import type { FactRecord, PortKey } from '../../types/entities.js';
import type { PortState, Protocol } from '../../types/port.js';
import type { CreateFactInput, UpdateFactInput } from '../../types/repository.js';

/**
 * Raw row shape returned by better-sqlite3 for the `port_facts` table.
 * Column names are snake_case as defined in the schema.
 */
interface FactRow {
  id: string;
  host_id: string;
  protocol: Protocol;
  port: number;
  first_seen_at: string;
  last_seen_at: string;
  last_disappeared_at: string | null;
  state: PortState;
  pid: number;
  process_name: string;
  command_line: string;
  total_seen_count: number;
  total_uptime_seconds: number;
}

const COLUMNS = `id, host_id, protocol, port, first_seen_at, last_seen_at, last_disappeared_at,
       state, pid, process_name, command_line, total_seen_count, total_uptime_seconds`;

/** Maps a snake_case DB row to a camelCase FactRecord entity. */
function rowToFact(row: FactRow): FactRecord {
  const fact: FactRecord = {
    id: row.id,
    hostId: row.host_id,
    protocol: row.protocol,
    port: row.port,
    firstSeenAt: row.first_seen_at,
    lastSeenAt: row.last_seen_at,
    state: row.state,
    pid: row.pid,
    processName: row.process_name,
    commandLine: row.command_line,
    totalSeenCount: row.total_seen_count,
    totalUptimeSeconds: row.total_uptime_seconds,
  };
  if (row.last_disappeared_at !== null) {
    fact.lastDisappearedAt = row.last_disappeared_at;
  }
  return fact;
}

/**
 * Repository for the `port_facts` table.
 *
 * All queries use prepared statements to prevent SQL injection.
 * The reconciler never calls delete(); only an explicit operator request does.
 */
export class FactRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** Insert a new FactRecord and return the full entity. */
  create(input: CreateFactInput): FactRecord {
    const id = crypto.randomUUID();

    const stmt = this.db.prepare(
      `INSERT INTO port_facts (${COLUMNS})
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    );

    stmt.run(
      id,
      input.hostId,
      input.protocol,
      input.port,
      input.firstSeenAt,
      input.lastSeenAt,
      input.lastDisappearedAt ?? null,
      input.state,
      input.pid,
      input.processName,
      input.commandLine,
      input.totalSeenCount,
      input.totalUptimeSeconds,
    );

    return { id, ...input };
  }

  /** Find a FactRecord by its primary key. Returns undefined if not found. */
  findById(id: string): FactRecord | undefined {
    const stmt = this.db.prepare<[string], FactRow>(
      `SELECT ${COLUMNS}
       FROM port_facts
       WHERE id = ?`,
    );

    const row = stmt.get(id);
    return row ? rowToFact(row) : undefined;
  }

  /** Find the FactRecord for a tuple. Returns undefined if not found. */
  findByKey(key: PortKey): FactRecord | undefined {
    const stmt = this.db.prepare<[string, string, number], FactRow>(
      `SELECT ${COLUMNS}
       FROM port_facts
       WHERE host_id = ? AND protocol = ? AND port = ?`,
    );

    const row = stmt.get(key.hostId, key.protocol, key.port);
    return row ? rowToFact(row) : undefined;
  }

  /** Return all FactRecords for a host, ordered by port then protocol. */
  findByHost(hostId: string): FactRecord[] {
    const stmt = this.db.prepare<[string], FactRow>(
      `SELECT ${COLUMNS}
       FROM port_facts
       WHERE host_id = ?
       ORDER BY port, protocol`,
    );

    return stmt.all(hostId).map(rowToFact);
  }

  /** Return all FactRecords. */
  findAll(): FactRecord[] {
    const stmt = this.db.prepare<[], FactRow>(
      `SELECT ${COLUMNS}
       FROM port_facts
       ORDER BY host_id, port, protocol`,
    );

    return stmt.all().map(rowToFact);
  }

  /**
   * Mutate an existing FactRecord in place with the provided fields.
   * Returns the updated entity, or undefined if the record was not found.
   */
  update(id: string, input: UpdateFactInput): FactRecord | undefined {
    const setClauses: string[] = [];
    const params: unknown[] = [];

    if (input.lastSeenAt !== undefined) {
      setClauses.push('last_seen_at = ?');
      params.push(input.lastSeenAt);
    }
    if (input.lastDisappearedAt !== undefined) {
      setClauses.push('last_disappeared_at = ?');
      params.push(input.lastDisappearedAt);
    }
    if (input.state !== undefined) {
      setClauses.push('state = ?');
      params.push(input.state);
    }
    if (input.pid !== undefined) {
      setClauses.push('pid = ?');
      params.push(input.pid);
    }
    if (input.processName !== undefined) {
      setClauses.push('process_name = ?');
      params.push(input.processName);
    }
    if (input.commandLine !== undefined) {
      setClauses.push('command_line = ?');
      params.push(input.commandLine);
    }
    if (input.totalSeenCount !== undefined) {
      setClauses.push('total_seen_count = ?');
      params.push(input.totalSeenCount);
    }
    if (input.totalUptimeSeconds !== undefined) {
      setClauses.push('total_uptime_seconds = ?');
      params.push(input.totalUptimeSeconds);
    }

    if (setClauses.length === 0) {
      return this.findById(id);
    }

    params.push(id);

    const sql = `UPDATE port_facts SET ${setClauses.join(', ')} WHERE id = ?`;
    const result = this.db.prepare(sql).run(...params);

    if (result.changes === 0) {
      return undefined;
    }

    return this.findById(id);
  }

  /** Delete the FactRecord for a tuple (its events cascade). Returns true if a row was deleted. */
  deleteByKey(key: PortKey): boolean {
    const stmt = this.db.prepare<[string, string, number]>(
      'DELETE FROM port_facts WHERE host_id = ? AND protocol = ? AND port = ?',
    );
    const result = stmt.run(key.hostId, key.protocol, key.port);
    return result.changes > 0;
  }
}
