/**
 * portmemo — Reconciler
 *
 * スキャン結果（現在の listening socket）と既存の FactRecord を突き合わせ、
 * appeared / continued / disappeared の 3 種類の遷移を適用する。
 * diffFacts() は純粋関数、reconcile() は 1 トランザクションで DB に書き込む。
 */

import type Database from 'better-sqlite3';
import type { FactRecord } from '../types/entities.js';
import type {
  CycleSummary,
  ObservationMap,
  ReconcileOptions,
  SocketScanner,
  Transition,
} from '../types/engine.js';
import { keyString } from '../types/port.js';
import { FactRepository } from '../db/repository/fact-repository.js';
import { EventRepository } from '../db/repository/event-repository.js';

// ============================================================
// diff
// ============================================================

/**
 * 既存 fact と観測結果の差分を遷移のリストとして返す。
 *
 * - 観測にあり fact にない      → appeared
 * - 観測にあり fact にある      → continued（active かつ記録済みプロセス名が
 *   空でなく観測と異なる場合は processChanged、disappeared だった場合は reappeared）
 * - 観測になく fact が active  → disappeared
 * - 観測になく fact が disappeared → 何もしない
 *
 * protocol が異なれば同じ port 番号でも別のキーとして扱う。
 */
export function diffFacts(existing: readonly FactRecord[], observed: ObservationMap): Transition[] {
  const byKey = new Map<string, FactRecord>();
  for (const fact of existing) {
    byKey.set(keyString(fact), fact);
  }

  const transitions: Transition[] = [];

  for (const [key, observation] of observed) {
    const fact = byKey.get(key);
    if (!fact) {
      transitions.push({ type: 'appeared', observation });
      continue;
    }
    const processChanged =
      fact.state === 'active' &&
      fact.processName !== '' &&
      fact.processName !== observation.processName;
    const reappeared = fact.state === 'disappeared';
    transitions.push({ type: 'continued', fact, observation, processChanged, reappeared });
  }

  for (const [key, fact] of byKey) {
    if (!observed.has(key) && fact.state === 'active') {
      transitions.push({ type: 'disappeared', fact });
    }
  }

  return transitions;
}

/** Approximate uptime: whole seconds since first observation. */
export function uptimeSeconds(firstSeenAt: string, now: Date): number {
  const elapsed = now.getTime() - new Date(firstSeenAt).getTime();
  return Math.max(0, Math.floor(elapsed / 1000));
}

// ============================================================
// reconcile
// ============================================================

/**
 * 1 サイクル分の突き合わせを実行する。
 *
 * fact の読み込みから最後のイベント追記までを 1 トランザクションで行うため、
 * 途中で失敗した場合は何も書き込まれない。
 *
 * @param db       better-sqlite3 の Database インスタンス
 * @param hostId   対象ホスト（このホストの fact だけを読み込む）
 * @param observed スキャナの出力
 * @param options  タイムスタンプ・alive イベントの有無
 * @returns 遷移ごとの件数
 */
export function reconcile(
  db: Database.Database,
  hostId: string,
  observed: ObservationMap,
  options: ReconcileOptions = {},
): CycleSummary {
  const factRepo = new FactRepository(db);
  const eventRepo = new EventRepository(db);
  const now = options.now ?? new Date();
  const nowIso = now.toISOString();

  const hostObservations: ObservationMap = new Map(
    [...observed].filter(([, observation]) => observation.hostId === hostId),
  );

  const run = db.transaction((): CycleSummary => {
    const summary: CycleSummary = {
      hostId,
      startedAt: nowIso,
      observed: hostObservations.size,
      appeared: 0,
      continued: 0,
      reappeared: 0,
      processChanged: 0,
      disappeared: 0,
      eventsWritten: 0,
    };

    const transitions = diffFacts(factRepo.findByHost(hostId), hostObservations);

    for (const transition of transitions) {
      switch (transition.type) {
        case 'appeared': {
          const { observation } = transition;
          const fact = factRepo.create({
            hostId: observation.hostId,
            protocol: observation.protocol,
            port: observation.port,
            firstSeenAt: nowIso,
            lastSeenAt: nowIso,
            state: 'active',
            pid: observation.pid,
            processName: observation.processName,
            commandLine: observation.commandLine,
            totalSeenCount: 1,
            totalUptimeSeconds: 0,
          });
          eventRepo.create({
            factId: fact.id,
            kind: 'appeared',
            occurredAt: nowIso,
            pid: observation.pid,
            processName: observation.processName,
          });
          summary.appeared++;
          summary.eventsWritten++;
          break;
        }

        case 'continued': {
          const { fact, observation, processChanged, reappeared } = transition;
          // 更新前に記録する（ポート乗っ取りの可能性）
          if (processChanged) {
            eventRepo.create({
              factId: fact.id,
              kind: 'process-changed',
              occurredAt: nowIso,
              pid: observation.pid,
              processName: observation.processName,
            });
            summary.processChanged++;
            summary.eventsWritten++;
          }
          factRepo.update(fact.id, {
            lastSeenAt: nowIso,
            state: 'active',
            pid: observation.pid,
            processName: observation.processName,
            commandLine: observation.commandLine,
            totalSeenCount: fact.totalSeenCount + 1,
            totalUptimeSeconds: uptimeSeconds(fact.firstSeenAt, now),
          });
          // 最新のライフサイクルイベントが disappeared のまま残らないようにする
          if (reappeared) {
            eventRepo.create({
              factId: fact.id,
              kind: 'appeared',
              occurredAt: nowIso,
              pid: observation.pid,
              processName: observation.processName,
            });
            summary.reappeared++;
            summary.eventsWritten++;
          }
          if (options.emitAliveEvents) {
            eventRepo.create({
              factId: fact.id,
              kind: 'alive',
              occurredAt: nowIso,
              pid: observation.pid,
              processName: observation.processName,
            });
            summary.eventsWritten++;
          }
          summary.continued++;
          break;
        }

        case 'disappeared': {
          const { fact } = transition;
          factRepo.update(fact.id, {
            state: 'disappeared',
            lastDisappearedAt: nowIso,
          });
          eventRepo.create({
            factId: fact.id,
            kind: 'disappeared',
            occurredAt: nowIso,
            pid: fact.pid,
            processName: fact.processName,
          });
          summary.disappeared++;
          summary.eventsWritten++;
          break;
        }

        default: {
          const _exhaustive: never = transition;
          throw new Error(`Unknown transition: ${JSON.stringify(_exhaustive)}`);
        }
      }
    }

    return summary;
  });

  return run();
}

/**
 * スキャンしてから reconcile() する。
 * スキャンに失敗した場合は ScanError をそのまま投げ、DB には触れない。
 */
export async function runReconciliationCycle(
  db: Database.Database,
  scanner: SocketScanner,
  hostId: string,
  options: ReconcileOptions = {},
): Promise<CycleSummary> {
  const observed = await scanner.scan(hostId);
  return reconcile(db, hostId, observed, options);
}
