import type Database from 'better-sqlite3';
import crypto from 'node:crypto';
import type { AnnotationRecord, PortKey } from '../../types/entities.js';
import type { Protocol, RiskLevel } from '../../types/port.js';
import type { CreateAnnotationInput, UpdateAnnotationInput } from '../../types/repository.js';

/**
 * Raw row shape returned by better-sqlite3 for the `port_annotations` table.
 * Column names are snake_case as defined in the schema.
 */
interface AnnotationRow {
  id: string;
  host_id: string;
  protocol: Protocol;
  port: number;
  title: string;
  description: string;
  owner: string;
  risk_level: RiskLevel;
  is_pinned: number;
  created_at: string;
  updated_at: string;
}

const COLUMNS = `id, host_id, protocol, port, title, description, owner, risk_level, is_pinned,
       created_at, updated_at`;

/** Maps a snake_case DB row to a camelCase AnnotationRecord entity. */
function rowToAnnotation(row: AnnotationRow): AnnotationRecord {
  return {
    id: row.id,
    hostId: row.host_id,
    protocol: row.protocol,
    port: row.port,
    title: row.title,
    description: row.description,
    owner: row.owner,
    riskLevel: row.risk_level,
    pinned: row.is_pinned === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Repository for the `port_annotations` table.
 *
 * All queries use prepared statements to prevent SQL injection.
 * Keyed by tuple only; nothing here reads or writes `port_facts`.
 */
export class AnnotationRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** Insert a new AnnotationRecord and return the full entity. */
  create(input: CreateAnnotationInput): AnnotationRecord {
    const id = crypto.randomUUID();
    const now = new Date().toISOString();

    const stmt = this.db.prepare<
      [string, string, string, number, string, string, string, string, number, string, string]
    >(
      `INSERT INTO port_annotations (${COLUMNS})
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    );

    stmt.run(
      id,
      input.hostId,
      input.protocol,
      input.port,
      input.title,
      input.description,
      input.owner,
      input.riskLevel,
      input.pinned ? 1 : 0,
      now,
      now,
    );

    return { id, ...input, createdAt: now, updatedAt: now };
  }

  /** Find an AnnotationRecord by its primary key. Returns undefined if not found. */
  findById(id: string): AnnotationRecord | undefined {
    const stmt = this.db.prepare<[string], AnnotationRow>(
      `SELECT ${COLUMNS}
       FROM port_annotations
       WHERE id = ?`,
    );

    const row = stmt.get(id);
    return row ? rowToAnnotation(row) : undefined;
  }

  /** Find the AnnotationRecord for a tuple. Returns undefined if not found. */
  findByKey(key: PortKey): AnnotationRecord | undefined {
    const stmt = this.db.prepare<[string, string, number], AnnotationRow>(
      `SELECT ${COLUMNS}
       FROM port_annotations
       WHERE host_id = ? AND protocol = ? AND port = ?`,
    );

    const row = stmt.get(key.hostId, key.protocol, key.port);
    return row ? rowToAnnotation(row) : undefined;
  }

  /** Return all AnnotationRecords for a host. */
  findByHost(hostId: string): AnnotationRecord[] {
    const stmt = this.db.prepare<[string], AnnotationRow>(
      `SELECT ${COLUMNS}
       FROM port_annotations
       WHERE host_id = ?
       ORDER BY port, protocol`,
    );

    return stmt.all(hostId).map(rowToAnnotation);
  }

  /** Return all AnnotationRecords. */
  findAll(): AnnotationRecord[] {
    const stmt = this.db.prepare<[], AnnotationRow>(
      `SELECT ${COLUMNS}
       FROM port_annotations
       ORDER BY host_id, port, protocol`,
    );

    return stmt.all().map(rowToAnnotation);
  }

  /**
   * Update an existing AnnotationRecord with the provided fields.
   * Always bumps `updated_at`. Returns the updated entity, or undefined if
   * the record was not found.
   */
  update(id: string, input: UpdateAnnotationInput): AnnotationRecord | undefined {
    const setClauses: string[] = [];
    const params: unknown[] = [];

    if (input.title !== undefined) {
      setClauses.push('title = ?');
      params.push(input.title);
    }
    if (input.description !== undefined) {
      setClauses.push('description = ?');
      params.push(input.description);
    }
    if (input.owner !== undefined) {
      setClauses.push('owner = ?');
      params.push(input.owner);
    }
    if (input.riskLevel !== undefined) {
      setClauses.push('risk_level = ?');
      params.push(input.riskLevel);
    }
    if (input.pinned !== undefined) {
      setClauses.push('is_pinned = ?');
      params.push(input.pinned ? 1 : 0);
    }

    setClauses.push('updated_at = ?');
    params.push(new Date().toISOString());

    params.push(id);

    const sql = `UPDATE port_annotations SET ${setClauses.join(', ')} WHERE id = ?`;
    const result = this.db.prepare(sql).run(...params);

    if (result.changes === 0) {
      return undefined;
    }

    return this.findById(id);
  }

  /** Delete the AnnotationRecord for a tuple. Returns true if a row was deleted. */
  deleteByKey(key: PortKey): boolean {
    const stmt = this.db.prepare<[string, string, number]>(
      'DELETE FROM port_annotations WHERE host_id = ? AND protocol = ? AND port = ?',
    );
    const result = stmt.run(key.hostId, key.protocol, key.port);
    return result.changes > 0;
  }
}
