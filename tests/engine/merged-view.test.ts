import { describe, it, expect, beforeEach } from 'vitest';
import type Database from 'better-sqlite3';
import { formatUptime, listMergedPorts } from '../../src/engine/merged-view.js';
import { reconcile } from '../../src/engine/reconciler.js';
import { upsertAnnotation } from '../../src/engine/port-memory.js';
import { acknowledge } from '../../src/engine/timeline.js';
import { at, key, observation, observations, openDb } from '../helpers/fixtures.js';

describe('formatUptime', () => {
  it.each([
    [0, '0h'],
    [5 * 3600 + 1800, '5h'],
    [86_400, '1d 0h'],
    [3 * 86_400 + 4 * 3600 + 59, '3d 4h'],
    [-30, '0h'],
  ])('%d 秒 → %s', (seconds, expected) => {
    expect(formatUptime(seconds)).toBe(expected);
  });
});

describe('listMergedPorts', () => {
  let db: InstanceType<typeof Database>;
  const T0 = at('2020-03-01T00:00:00.000Z');

  beforeEach(() => {
    db = openDb();
  });

  it('注釈のない active fact は suspicious、riskLevel は unknown', () => {
    reconcile(db, 'local', observations(observation(8080, 'node', { pid: 4000 })), { now: T0 });

    const [item] = listMergedPorts(db, 'local', at('2020-03-02T02:30:00.000Z'));

    expect(item).toMatchObject({
      hostId: 'local',
      protocol: 'tcp',
      port: 8080,
      state: 'active',
      pid: 4000,
      processName: 'node',
      commandLine: '/usr/bin/node',
      totalSeenCount: 1,
      totalUptimeSeconds: 0,
      uptimeHuman: '1d 2h',
      riskLevel: 'unknown',
      pinned: false,
      status: 'suspicious',
      latestEventKind: 'appeared',
      latestEventAt: T0.toISOString(),
    });
    expect(item.annotationId).toBeUndefined();
    expect(item.factId).toBeDefined();
  });

  it('注釈だけの tuple も 1 行として返し status は unknown', () => {
    upsertAnnotation(db, key(9200), { title: 'elasticsearch', riskLevel: 'trusted', pinned: true });

    expect(listMergedPorts(db, 'local')).toEqual([
      expect.objectContaining({
        port: 9200,
        state: 'unknown',
        totalSeenCount: 0,
        totalUptimeSeconds: 0,
        uptimeHuman: '',
        title: 'elasticsearch',
        riskLevel: 'trusted',
        pinned: true,
        status: 'unknown',
      }),
    ]);
    expect(listMergedPorts(db, 'local')[0].factId).toBeUndefined();
  });

  it('fact と注釈を tuple で結合し、disappeared は ghost で uptimeHuman は空', () => {
    reconcile(db, 'local', observations(observation(5432, 'postgres')), { now: T0 });
    upsertAnnotation(db, key(5432), { title: 'db', owner: 'dba', riskLevel: 'trusted' });
    reconcile(db, 'local', new Map(), { now: at('2020-03-01T00:10:00.000Z') });

    const [item] = listMergedPorts(db, 'local');

    expect(item).toMatchObject({
      state: 'disappeared',
      title: 'db',
      owner: 'dba',
      description: '',
      riskLevel: 'trusted',
      status: 'ghost',
      uptimeHuman: '',
      lastDisappearedAt: '2020-03-01T00:10:00.000Z',
      latestEventKind: 'disappeared',
    });
  });

  it('最新イベントには operator のイベントも含む', () => {
    reconcile(db, 'local', observations(observation(22, 'sshd')), { now: T0 });
    acknowledge(db, key(22));

    expect(listMergedPorts(db, 'local')[0].latestEventKind).toBe('acknowledged');
  });

  it('port → protocol の順に並べ、他のホストは含めない', () => {
    reconcile(
      db,
      'local',
      observations(
        observation(443, 'nginx'),
        observation(53, 'dnsmasq', { protocol: 'udp' }),
        observation(53, 'dnsmasq'),
      ),
      { now: T0 },
    );
    upsertAnnotation(db, key(80), { title: 'http' });
    upsertAnnotation(db, key(22, 'tcp', 'other'), { title: 'elsewhere' });

    const rows = listMergedPorts(db, 'local').map((i) => `${i.protocol}/${i.port}:${i.status}`);

    expect(rows).toEqual(['tcp/53:suspicious', 'udp/53:suspicious', 'tcp/80:unknown', 'tcp/443:suspicious']);
    expect(listMergedPorts(db, 'other').map((i) => i.title)).toEqual(['elsewhere']);
  });

  it('何もなければ空配列', () => {
    expect(listMergedPorts(db, 'local')).toEqual([]);
  });
});
