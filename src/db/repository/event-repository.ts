import type Database from 'better-sqlite3';
import crypto from 'node:crypto';
import type { TimelineEvent } from '../../types/entities.js';
import type { EventKind } from '../../types/port.js';
import type { CreateEventInput } from '../../types/repository.js';

/**
 * Raw row shape returned by better-sqlite3 for the `port_events` table.
 * Column names are snake_case as defined in the schema.
 */
interface EventRow {
  id: string;
  fact_id: string;
  kind: EventKind;
  occurred_at: string;
  pid: number;
  process_name: string;
  payload: string | null;
}

/** Maps a snake_case DB row to a camelCase TimelineEvent entity. */
function rowToEvent(row: EventRow): TimelineEvent {
  const event: TimelineEvent = {
    id: row.id,
    factId: row.fact_id,
    kind: row.kind,
    occurredAt: row.occurred_at,
    pid: row.pid,
    processName: row.process_name,
  };
  if (row.payload !== null) {
    event.payload = row.payload;
  }
  return event;
}

/**
 * Repository for the append-only `port_events` table.
 *
 * There is no update method. Events disappear only with their fact
 * (ON DELETE CASCADE). Events written in the same cycle share a timestamp,
 * so newest-first ordering breaks ties on insertion order (rowid).
 */
export class EventRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** Append a new TimelineEvent and return the full entity. */
  create(input: CreateEventInput): TimelineEvent {
    const id = crypto.randomUUID();

    const stmt = this.db.prepare<
      [string, string, string, string, number, string, string | null]
    >(
      `INSERT INTO port_events (id, fact_id, kind, occurred_at, pid, process_name, payload)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    );

    stmt.run(
      id,
      input.factId,
      input.kind,
      input.occurredAt,
      input.pid,
      input.processName,
      input.payload ?? null,
    );

    return { id, ...input };
  }

  /** Return all events of a fact, newest first. */
  findByFactId(factId: string): TimelineEvent[] {
    const stmt = this.db.prepare<[string], EventRow>(
      `SELECT id, fact_id, kind, occurred_at, pid, process_name, payload
       FROM port_events
       WHERE fact_id = ?
       ORDER BY occurred_at DESC, rowid DESC`,
    );

    return stmt.all(factId).map(rowToEvent);
  }

  /**
   * Return the most recent event of a fact, optionally restricted to some kinds.
   * Returns undefined if the fact has no matching event.
   */
  findLatestByFactId(factId: string, kinds?: readonly EventKind[]): TimelineEvent | undefined {
    let sql = `SELECT id, fact_id, kind, occurred_at, pid, process_name, payload
       FROM port_events
       WHERE fact_id = ?`;
    const params: string[] = [factId];

    if (kinds && kinds.length > 0) {
      sql += ` AND kind IN (${kinds.map(() => '?').join(', ')})`;
      params.push(...kinds);
    }
    sql += ' ORDER BY occurred_at DESC, rowid DESC LIMIT 1';

    const row = this.db.prepare<string[], EventRow>(sql).get(...params);
    return row ? rowToEvent(row) : undefined;
  }

  /** Return every event. Used by snapshot export. */
  findAll(): TimelineEvent[] {
    const stmt = this.db.prepare<[], EventRow>(
      `SELECT id, fact_id, kind, occurred_at, pid, process_name, payload
       FROM port_events
       ORDER BY occurred_at, rowid`,
    );

    return stmt.all().map(rowToEvent);
  }
}
