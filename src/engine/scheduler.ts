/**
 * portmemo — Reconcile Scheduler
 *
 * DB ハンドル・スキャナ・ホスト ID を保持し、node-cron の周期と手動トリガーで
 * 突き合わせサイクルを実行する。サイクルは常に 1 つずつ（single flight）。
 */

import cron from 'node-cron';
import type Database from 'better-sqlite3';
import type { Logger } from '../logger.js';
import type { CycleOutcome, ReconcileOptions, SocketScanner } from '../types/engine.js';
import { runReconciliationCycle } from './reconciler.js';
import { ScanError } from './errors.js';

export interface SchedulerDeps {
  db: Database.Database;
  scanner: SocketScanner;
  hostId: string;
  logger: Logger;
  /** node-cron expression. */
  schedule: string;
  reconcileOptions?: Omit<ReconcileOptions, 'now'>;
}

interface CronTask {
  stop(): void;
}

export class ReconcileScheduler {
  private readonly deps: SchedulerDeps;
  private task: CronTask | undefined;
  private queue: Promise<unknown> = Promise.resolve();
  private pending = 0;

  constructor(deps: SchedulerDeps) {
    this.deps = deps;
  }

  /** True while a cycle is running or waiting for its turn. */
  get busy(): boolean {
    return this.pending > 0;
  }

  /** Run one cycle immediately, then on every cron tick. */
  start(): void {
    if (this.task) return;
    this.task = cron.schedule(this.deps.schedule, () => {
      void this.tick();
    });
    this.deps.logger.info(
      { schedule: this.deps.schedule, hostId: this.deps.hostId },
      'reconcile scheduler started',
    );
    void this.tick();
  }

  stop(): void {
    this.task?.stop();
    this.task = undefined;
  }

  /**
   * 手動トリガー。実行中のサイクルがあれば終わるのを待ってから実行し、
   * このトリガーで起きたサイクルの結果を返す。
   */
  runNow(): Promise<CycleOutcome> {
    return this.enqueue();
  }

  /** Wait until every queued cycle has finished. */
  async idle(): Promise<void> {
    await this.queue;
  }

  private async tick(): Promise<void> {
    if (this.busy) {
      this.deps.logger.warn({ hostId: this.deps.hostId }, 'previous cycle still running, tick skipped');
      return;
    }
    await this.enqueue();
  }

  private enqueue(): Promise<CycleOutcome> {
    this.pending++;
    const next = this.queue.then(() => this.runCycle());
    this.queue = next.finally(() => {
      this.pending--;
    });
    return next;
  }

  private async runCycle(): Promise<CycleOutcome> {
    const { db, scanner, hostId, logger, reconcileOptions } = this.deps;
    try {
      const summary = await runReconciliationCycle(db, scanner, hostId, reconcileOptions);
      logger.info(summary, 'reconcile cycle complete');
      return { ok: true, summary };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      if (err instanceof ScanError) {
        logger.error({ err, hostId }, 'scan failed, cycle skipped');
      } else {
        logger.error({ err, hostId }, 'reconcile cycle failed, rolled back');
      }
      return { ok: false, error: message };
    }
  }
}
