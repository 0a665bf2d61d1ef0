/**
 * portmemo — ReconcileScheduler テスト
 *
 * node-cron はモックし、cron のコールバックを直接呼んで周期実行を再現する。
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type Database from 'better-sqlite3';
import { ReconcileScheduler } from '../../src/engine/scheduler.js';
import { ScanError } from '../../src/engine/errors.js';
import { FactRepository } from '../../src/db/repository/fact-repository.js';
import type { ObservationMap, SocketScanner } from '../../src/types/engine.js';
import {
  FakeScanner,
  captureLogger,
  key,
  observation,
  observations,
  openDb,
} from '../helpers/fixtures.js';

const cronMock = vi.hoisted(() => {
  const stop = vi.fn();
  const schedule = vi.fn((_expression: string, _task: () => void) => ({ stop }));
  return { schedule, stop, validate: vi.fn(() => true) };
});

vi.mock('node-cron', () => ({ default: cronMock }));

// ---------------------------------------------------------------------------
// ヘルパー
// ---------------------------------------------------------------------------

/** scan() は release() されるまで完了しない。 */
class GatedScanner implements SocketScanner {
  private readonly waiting: Array<(result: ObservationMap) => void> = [];
  calls = 0;

  get pending(): number {
    return this.waiting.length;
  }

  scan(): Promise<ObservationMap> {
    this.calls++;
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  release(result: ObservationMap): void {
    const next = this.waiting.shift();
    if (!next) throw new Error('no scan in flight');
    next(result);
  }
}

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

// ---------------------------------------------------------------------------
// テスト
// ---------------------------------------------------------------------------

describe('ReconcileScheduler', () => {
  let db: InstanceType<typeof Database>;

  beforeEach(() => {
    db = openDb();
    vi.clearAllMocks();
  });

  function createScheduler(scanner: SocketScanner, emitAliveEvents = false) {
    const { logger, lines } = captureLogger();
    const scheduler = new ReconcileScheduler({
      db,
      scanner,
      hostId: 'local',
      logger,
      schedule: '*/5 * * * *',
      reconcileOptions: { emitAliveEvents },
    });
    return { scheduler, lines };
  }

  it('runNow - サイクルを実行してサマリを返す', async () => {
    const { scheduler, lines } = createScheduler(
      new FakeScanner(observations(observation(22, 'sshd'), observation(80, 'nginx'))),
    );

    const outcome = await scheduler.runNow();

    expect(outcome).toMatchObject({ ok: true, summary: { hostId: 'local', appeared: 2 } });
    expect(lines.map((l) => l.msg)).toContain('reconcile cycle complete');
  });

  it('runNow - reconcileOptions が各サイクルに渡される', async () => {
    const scan = observations(observation(22, 'sshd'));
    const { scheduler } = createScheduler(new FakeScanner(scan, scan), true);

    await scheduler.runNow();
    const outcome = await scheduler.runNow();

    expect(outcome).toMatchObject({ ok: true, summary: { continued: 1, eventsWritten: 1 } });
  });

  it('スキャン失敗 - ok: false を返し、fact は変更せず error ログを出す', async () => {
    const scanner = new FakeScanner(
      observations(observation(22, 'sshd')),
      new ScanError('ss exited with 1'),
    );
    const { scheduler, lines } = createScheduler(scanner);
    await scheduler.runNow();

    const outcome = await scheduler.runNow();

    expect(outcome).toEqual({ ok: false, error: 'ss exited with 1' });
    expect(new FactRepository(db).findByKey(key(22))).toMatchObject({
      state: 'active',
      totalSeenCount: 1,
    });
    expect(lines.find((l) => l.msg === 'scan failed, cycle skipped')?.level).toBe(50);
  });

  it('書き込み失敗 - ロールバックして ok: false を返す', async () => {
    const { scheduler, lines } = createScheduler(
      new FakeScanner(observations(observation(22, 'sshd'))),
    );
    db.exec(`
      CREATE TRIGGER fail_on_appeared BEFORE INSERT ON port_events
      WHEN NEW.kind = 'appeared'
      BEGIN SELECT RAISE(ABORT, 'disk full'); END;
    `);

    const outcome = await scheduler.runNow();

    expect(outcome).toEqual({ ok: false, error: 'disk full' });
    expect(new FactRepository(db).findAll()).toEqual([]);
    expect(lines.map((l) => l.msg)).toContain('reconcile cycle failed, rolled back');
  });

  it('single flight - 同時の runNow は順番に 1 つずつ実行され、それぞれの結果を返す', async () => {
    const scanner = new GatedScanner();
    const { scheduler } = createScheduler(scanner);

    const first = scheduler.runNow();
    const second = scheduler.runNow();
    await flush();

    expect(scanner.calls).toBe(1);
    expect(scheduler.busy).toBe(true);

    scanner.release(observations(observation(22, 'sshd')));
    await flush();
    expect(scanner.calls).toBe(2);

    scanner.release(new Map());
    const [a, b] = await Promise.all([first, second]);

    expect(a).toMatchObject({ ok: true, summary: { appeared: 1, disappeared: 0 } });
    expect(b).toMatchObject({ ok: true, summary: { appeared: 0, disappeared: 1 } });
    await scheduler.idle();
    expect(scheduler.busy).toBe(false);
  });

  it('start - cron に登録し、直ちに 1 サイクル実行する', async () => {
    const { scheduler, lines } = createScheduler(
      new FakeScanner(observations(observation(22, 'sshd'))),
    );

    scheduler.start();
    await scheduler.idle();

    expect(cronMock.schedule).toHaveBeenCalledTimes(1);
    expect(cronMock.schedule.mock.calls[0][0]).toBe('*/5 * * * *');
    expect(new FactRepository(db).findByKey(key(22))?.state).toBe('active');
    expect(lines.map((l) => l.msg)).toContain('reconcile scheduler started');

    scheduler.start();
    expect(cronMock.schedule).toHaveBeenCalledTimes(1);

    scheduler.stop();
    expect(cronMock.stop).toHaveBeenCalledTimes(1);
  });

  it('周期実行 - 前のサイクルが実行中なら tick をスキップして warn ログを出す', async () => {
    const scanner = new GatedScanner();
    const { scheduler, lines } = createScheduler(scanner);

    scheduler.start();
    await flush();
    const tick = cronMock.schedule.mock.calls[0][1];
    tick();
    await flush();

    expect(scanner.calls).toBe(1);
    expect(lines.find((l) => l.msg === 'previous cycle still running, tick skipped')?.level).toBe(40);

    scanner.release(new Map());
    await scheduler.idle();

    tick();
    await flush();
    expect(scanner.calls).toBe(2);
    scanner.release(new Map());
    await scheduler.idle();
    scheduler.stop();
  });
});
