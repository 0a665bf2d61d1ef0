import { describe, it, expect, beforeEach } from 'vitest';
import type Database from 'better-sqlite3';
import { acknowledge, getTimeline, recordDiagnosis } from '../../src/engine/timeline.js';
import { reconcile } from '../../src/engine/reconciler.js';
import { NotFoundError, ValidationError } from '../../src/engine/errors.js';
import { FactRepository } from '../../src/db/repository/fact-repository.js';
import { at, key, observation, observations, openDb } from '../helpers/fixtures.js';

describe('timeline', () => {
  let db: InstanceType<typeof Database>;

  beforeEach(() => {
    db = openDb();
    reconcile(db, 'local', observations(observation(6379, 'redis', { pid: 77 })), {
      now: at('2020-03-01T00:00:00.000Z'),
    });
    reconcile(db, 'local', new Map(), { now: at('2020-03-01T00:01:00.000Z') });
  });

  it('getTimeline - 新しい順に返す', () => {
    expect(getTimeline(db, key(6379)).map((e) => [e.kind, e.occurredAt])).toEqual([
      ['disappeared', '2020-03-01T00:01:00.000Z'],
      ['appeared', '2020-03-01T00:00:00.000Z'],
    ]);
  });

  it('getTimeline - fact がなければ NotFoundError', () => {
    expect(() => getTimeline(db, key(6380))).toThrow(NotFoundError);
    expect(() => getTimeline(db, key(6379, 'udp'))).toThrow('Port fact not found: local/udp/6379');
  });

  it('getTimeline - 不正な key は ValidationError', () => {
    expect(() => getTimeline(db, key(0))).toThrow(ValidationError);
  });

  it('acknowledge - acknowledged を追記し state は変えない', () => {
    const event = acknowledge(db, key(6379));

    expect(event).toMatchObject({ kind: 'acknowledged', pid: 77, processName: 'redis' });
    expect(getTimeline(db, key(6379))[0].id).toBe(event.id);
    expect(new FactRepository(db).findByKey(key(6379))?.state).toBe('disappeared');
  });

  it('recordDiagnosis - 出力を payload に持つ diagnosed を追記する', () => {
    const event = recordDiagnosis(db, key(6379), 'redis-server (pid 77) owned by redis');

    expect(event.kind).toBe('diagnosed');
    expect(getTimeline(db, key(6379))[0]).toMatchObject({
      kind: 'diagnosed',
      payload: 'redis-server (pid 77) owned by redis',
    });
  });

  it('recordDiagnosis - protocol が違えば別の tuple として NotFoundError', () => {
    expect(() => recordDiagnosis(db, key(6379, 'udp'), 'x')).toThrow(NotFoundError);
  });
});
