/**
 * portmemo — Timeline operations
 *
 * tuple 単位の履歴取得と、オペレータ操作によるイベント追記
 * （acknowledged / diagnosed）。いずれも fact が存在しない場合は NotFoundError。
 */

import type Database from 'better-sqlite3';
import type { FactRecord, PortKey, TimelineEvent } from '../types/entities.js';
import type { EventKind } from '../types/port.js';
import { FactRepository } from '../db/repository/fact-repository.js';
import { EventRepository } from '../db/repository/event-repository.js';
import { NotFoundError } from './errors.js';
import { validateKey } from './validation.js';

/** Return the FactRecord for a tuple or throw NotFoundError. */
export function requireFact(db: Database.Database, key: PortKey): FactRecord {
  const validKey = validateKey(key);
  const fact = new FactRepository(db).findByKey(validKey);
  if (!fact) {
    throw new NotFoundError('Port fact', validKey);
  }
  return fact;
}

/** Timeline of a tuple, newest first. */
export function getTimeline(db: Database.Database, key: PortKey): TimelineEvent[] {
  const fact = requireFact(db, key);
  return new EventRepository(db).findByFactId(fact.id);
}

function appendOperatorEvent(
  db: Database.Database,
  key: PortKey,
  kind: EventKind,
  payload?: string,
): TimelineEvent {
  const fact = requireFact(db, key);
  return new EventRepository(db).create({
    factId: fact.id,
    kind,
    occurredAt: new Date().toISOString(),
    pid: fact.pid,
    processName: fact.processName,
    payload,
  });
}

/** Mark the current warning on a tuple as seen by the operator. */
export function acknowledge(db: Database.Database, key: PortKey): TimelineEvent {
  return appendOperatorEvent(db, key, 'acknowledged');
}

/** Append a `diagnosed` event carrying the diagnostic tool's output. */
export function recordDiagnosis(
  db: Database.Database,
  key: PortKey,
  output: string,
): TimelineEvent {
  return appendOperatorEvent(db, key, 'diagnosed', output);
}
