/**
 * portmemo — Merged view
 *
 * fact と注釈を tuple でクエリ時に結合し、導出ステータスと最新イベントを付与する。
 * どちらか一方にしか存在しない tuple も 1 行として返す。
 */

import type Database from 'better-sqlite3';
import type { AnnotationRecord, FactRecord } from '../types/entities.js';
import type { MergedItem } from '../types/engine.js';
import { keyString } from '../types/port.js';
import { FactRepository } from '../db/repository/fact-repository.js';
import { AnnotationRepository } from '../db/repository/annotation-repository.js';
import { EventRepository } from '../db/repository/event-repository.js';
import { deriveStatus } from './status.js';

/** `3d 4h` for a day or more, otherwise `5h`. */
export function formatUptime(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const days = Math.floor(total / 86_400);
  const hours = Math.floor((total % 86_400) / 3_600);
  return days > 0 ? `${days}d ${hours}h` : `${hours}h`;
}

function mergeItem(
  fact: FactRecord | undefined,
  annotation: AnnotationRecord | undefined,
  eventRepo: EventRepository,
  now: Date,
): MergedItem {
  const base = fact ?? annotation;
  if (!base) {
    throw new Error('mergeItem requires a fact or an annotation');
  }

  const item: MergedItem = {
    hostId: base.hostId,
    protocol: base.protocol,
    port: base.port,
    state: fact?.state ?? 'unknown',
    totalSeenCount: fact?.totalSeenCount ?? 0,
    totalUptimeSeconds: fact?.totalUptimeSeconds ?? 0,
    uptimeHuman: '',
    riskLevel: annotation?.riskLevel ?? 'unknown',
    pinned: annotation?.pinned ?? false,
    status: deriveStatus(fact, annotation),
  };

  if (fact) {
    item.factId = fact.id;
    item.firstSeenAt = fact.firstSeenAt;
    item.lastSeenAt = fact.lastSeenAt;
    item.lastDisappearedAt = fact.lastDisappearedAt;
    item.pid = fact.pid;
    item.processName = fact.processName;
    item.commandLine = fact.commandLine;
    if (fact.state === 'active') {
      item.uptimeHuman = formatUptime(
        (now.getTime() - new Date(fact.firstSeenAt).getTime()) / 1000,
      );
    }

    const latest = eventRepo.findLatestByFactId(fact.id);
    if (latest) {
      item.latestEventKind = latest.kind;
      item.latestEventAt = latest.occurredAt;
    }
  }

  if (annotation) {
    item.annotationId = annotation.id;
    item.title = annotation.title;
    item.description = annotation.description;
    item.owner = annotation.owner;
  }

  return item;
}

/**
 * ホスト単位の結合ビュー。port → protocol の順に並べる。
 *
 * @param db     better-sqlite3 の Database インスタンス
 * @param hostId 対象ホスト
 * @param now    uptimeHuman の基準時刻
 */
export function listMergedPorts(
  db: Database.Database,
  hostId: string,
  now: Date = new Date(),
): MergedItem[] {
  const eventRepo = new EventRepository(db);

  const read = db.transaction((): MergedItem[] => {
    const facts = new Map<string, FactRecord>();
    for (const fact of new FactRepository(db).findByHost(hostId)) {
      facts.set(keyString(fact), fact);
    }
    const annotations = new Map<string, AnnotationRecord>();
    for (const annotation of new AnnotationRepository(db).findByHost(hostId)) {
      annotations.set(keyString(annotation), annotation);
    }

    const keys = new Set([...facts.keys(), ...annotations.keys()]);
    return [...keys].map((key) => mergeItem(facts.get(key), annotations.get(key), eventRepo, now));
  });

  return read().sort((a, b) => a.port - b.port || a.protocol.localeCompare(b.protocol));
}
