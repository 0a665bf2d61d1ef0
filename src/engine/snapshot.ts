/**
 * portmemo — Snapshot import / export
 *
 * 旧バージョンのエクスポート JSON（runtimes / notes / events、snake_case）と
 * 互換の形式で全データを入出力する。タイムスタンプはタイムゾーンなし
 * （`2026-02-10T11:55:10.009789`）も受け付け、UTC として扱う。
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { FactRepository } from '../db/repository/fact-repository.js';
import { EventRepository } from '../db/repository/event-repository.js';
import { AnnotationRepository } from '../db/repository/annotation-repository.js';
import type { EventKind } from '../types/port.js';
import { EVENT_KINDS, PortNumberSchema, ProtocolSchema, RiskLevelSchema } from '../types/port.js';
import { upsertAnnotation } from './port-memory.js';

// ============================================================
// タイムスタンプ
// ============================================================

const TIMESTAMP_PATTERN =
  /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}:\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:\d{2})?$/;

/**
 * RFC 3339 とタイムゾーンなしの ISO 8601 を受け付け、UTC の ISO 文字列を返す。
 * 小数秒はミリ秒に切り詰める。解釈できない場合は undefined。
 */
export function parseLegacyTimestamp(value: string): string | undefined {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) return undefined;

  const [, date, time, fraction, zone] = match;
  const millis = (fraction ?? '').padEnd(3, '0').slice(0, 3);
  const offset = zone ?? 'Z';
  const parsed = new Date(`${date}T${time}.${millis}${offset}`);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed.toISOString();
}

const TimestampSchema = z.string().transform((value, ctx) => {
  const iso = parseLegacyTimestamp(value);
  if (iso === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid timestamp: ${value}` });
    return z.NEVER;
  }
  return iso;
});

const LEGACY_EVENT_KINDS: Record<string, EventKind> = {
  process_change: 'process-changed',
  diagnosis: 'diagnosed',
};

const EventKindSchema = z
  .string()
  .transform((value) => LEGACY_EVENT_KINDS[value] ?? value)
  .pipe(z.enum(EVENT_KINDS));

// ============================================================
// スキーマ
// ============================================================

const RuntimeSchema = z.object({
  id: z.union([z.number(), z.string()]),
  host_id: z.string().min(1).default('local'),
  protocol: ProtocolSchema,
  port: PortNumberSchema,
  first_seen_at: TimestampSchema,
  last_seen_at: TimestampSchema,
  last_disappeared_at: TimestampSchema.nullish(),
  current_state: z.enum(['active', 'disappeared']),
  current_pid: z.number().int().nullish(),
  process_name: z.string().nullish(),
  cmdline: z.string().nullish(),
  total_seen_count: z.number().int().nonnegative().default(1),
  total_uptime_seconds: z.number().int().nonnegative().default(0),
});

const NoteSchema = z.object({
  host_id: z.string().min(1).default('local'),
  protocol: ProtocolSchema,
  port: PortNumberSchema,
  title: z.string().nullish(),
  description: z.string().nullish(),
  owner: z.string().nullish(),
  risk_level: RiskLevelSchema.catch('expected'),
  is_pinned: z.boolean().nullish(),
});

const EventSchema = z.object({
  port_runtime_id: z.union([z.number(), z.string()]),
  event_type: EventKindSchema,
  timestamp: TimestampSchema,
  pid: z.number().int().nullish(),
  process_name: z.string().nullish(),
  payload: z.string().nullish(),
});

export const SnapshotSchema = z.object({
  runtimes: z.array(RuntimeSchema).default([]),
  notes: z.array(NoteSchema).default([]),
  events: z.array(EventSchema).default([]),
});

/** Export shape. Field names follow the legacy export for compatibility. */
export interface Snapshot {
  runtimes: Array<{
    id: string;
    host_id: string;
    protocol: string;
    port: number;
    first_seen_at: string;
    last_seen_at: string;
    last_disappeared_at: string | null;
    current_state: string;
    current_pid: number;
    process_name: string;
    cmdline: string;
    total_seen_count: number;
    total_uptime_seconds: number;
  }>;
  notes: Array<{
    id: string;
    host_id: string;
    protocol: string;
    port: number;
    title: string;
    description: string;
    owner: string;
    risk_level: string;
    is_pinned: boolean;
  }>;
  events: Array<{
    id: string;
    port_runtime_id: string;
    event_type: string;
    timestamp: string;
    pid: number;
    process_name: string;
    payload: string | null;
  }>;
}

export interface ImportResult {
  factsImported: number;
  factsSkipped: number;
  annotationsImported: number;
  eventsImported: number;
  eventsSkipped: number;
}

// ============================================================
// export
// ============================================================

export function exportSnapshot(db: Database.Database): Snapshot {
  const facts = new FactRepository(db).findAll();
  const annotations = new AnnotationRepository(db).findAll();
  const events = new EventRepository(db).findAll();

  return {
    runtimes: facts.map((f) => ({
      id: f.id,
      host_id: f.hostId,
      protocol: f.protocol,
      port: f.port,
      first_seen_at: f.firstSeenAt,
      last_seen_at: f.lastSeenAt,
      last_disappeared_at: f.lastDisappearedAt ?? null,
      current_state: f.state,
      current_pid: f.pid,
      process_name: f.processName,
      cmdline: f.commandLine,
      total_seen_count: f.totalSeenCount,
      total_uptime_seconds: f.totalUptimeSeconds,
    })),
    notes: annotations.map((a) => ({
      id: a.id,
      host_id: a.hostId,
      protocol: a.protocol,
      port: a.port,
      title: a.title,
      description: a.description,
      owner: a.owner,
      risk_level: a.riskLevel,
      is_pinned: a.pinned,
    })),
    events: events.map((e) => ({
      id: e.id,
      port_runtime_id: e.factId,
      event_type: e.kind,
      timestamp: e.occurredAt,
      pid: e.pid,
      process_name: e.processName,
      payload: e.payload ?? null,
    })),
  };
}

// ============================================================
// import
// ============================================================

/**
 * スナップショットを 1 トランザクションで取り込む。
 *
 * - 既に fact がある tuple の runtime はスキップし、そのイベントもスキップする
 * - runtime の id は新しい UUID に振り直し、events.port_runtime_id を対応付ける
 * - notes は tuple で upsert する
 *
 * スキーマに合わない入力は ZodError を投げ、何も書き込まない。
 */
export function importSnapshot(db: Database.Database, data: unknown): ImportResult {
  const snapshot = SnapshotSchema.parse(data);
  const factRepo = new FactRepository(db);
  const eventRepo = new EventRepository(db);

  const run = db.transaction((): ImportResult => {
    const result: ImportResult = {
      factsImported: 0,
      factsSkipped: 0,
      annotationsImported: 0,
      eventsImported: 0,
      eventsSkipped: 0,
    };
    const idMap = new Map<string, string>();

    for (const r of snapshot.runtimes) {
      const key = { hostId: r.host_id, protocol: r.protocol, port: r.port };
      if (factRepo.findByKey(key)) {
        result.factsSkipped++;
        continue;
      }
      const fact = factRepo.create({
        ...key,
        firstSeenAt: r.first_seen_at,
        lastSeenAt: r.last_seen_at,
        lastDisappearedAt: r.last_disappeared_at ?? undefined,
        state: r.current_state,
        pid: r.current_pid ?? 0,
        processName: r.process_name ?? '',
        commandLine: r.cmdline ?? '',
        totalSeenCount: r.total_seen_count,
        totalUptimeSeconds: r.total_uptime_seconds,
      });
      idMap.set(String(r.id), fact.id);
      result.factsImported++;
    }

    for (const n of snapshot.notes) {
      const patch: Record<string, unknown> = { riskLevel: n.risk_level };
      if (n.title != null) patch['title'] = n.title;
      if (n.description != null) patch['description'] = n.description;
      if (n.owner != null) patch['owner'] = n.owner;
      if (n.is_pinned != null) patch['pinned'] = n.is_pinned;
      upsertAnnotation(db, { hostId: n.host_id, protocol: n.protocol, port: n.port }, patch);
      result.annotationsImported++;
    }

    for (const e of snapshot.events) {
      const factId = idMap.get(String(e.port_runtime_id));
      if (!factId) {
        result.eventsSkipped++;
        continue;
      }
      eventRepo.create({
        factId,
        kind: e.event_type,
        occurredAt: e.timestamp,
        pid: e.pid ?? 0,
        processName: e.process_name ?? '',
        payload: e.payload ?? undefined,
      });
      result.eventsImported++;
    }

    return result;
  });

  return run();
}
