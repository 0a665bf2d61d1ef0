/**
 * portmemo - Entity type definitions
 *
 * These interfaces map 1:1 to the SQL tables defined in src/db/schema.ts.
 * Property names are camelCase conversions of the snake_case column names.
 *
 * Conventions:
 *   TEXT          -> string
 *   INTEGER       -> number
 *   nullable col  -> optional property (?)
 *   All IDs       -> string (UUID)
 *   All timestamps -> string (ISO 8601)
 */

import type { EventKind, PortState, Protocol, RiskLevel } from './port.js';

// ============================================================
// tuple key
// ============================================================

/** The (host, protocol, port) triple identifying a monitored endpoint. */
export interface PortKey {
  hostId: string;
  protocol: Protocol;
  port: number;
}

// ============================================================
// port_facts
// ============================================================

/** Machine-observed state of one listening port. Mutated in place every cycle. */
export interface FactRecord extends PortKey {
  id: string;
  firstSeenAt: string;
  lastSeenAt: string;
  lastDisappearedAt?: string;
  state: PortState;
  pid: number;
  processName: string;
  commandLine: string;
  totalSeenCount: number;
  totalUptimeSeconds: number;
}

// ============================================================
// port_events
// ============================================================

/** Append-only timeline entry belonging to a FactRecord. */
export interface TimelineEvent {
  id: string;
  factId: string;
  kind: EventKind;
  occurredAt: string;
  pid: number;
  processName: string;
  payload?: string;
}

// ============================================================
// port_annotations
// ============================================================

/**
 * Human-entered memory about a tuple. Joined to facts by key only, so it may
 * exist without a fact and outlives fact deletion.
 */
export interface AnnotationRecord extends PortKey {
  id: string;
  title: string;
  description: string;
  owner: string;
  riskLevel: RiskLevel;
  pinned: boolean;
  createdAt: string;
  updatedAt: string;
}
