/**
 * portmemo — Engine layer type definitions
 *
 * Engine 層の入出力型。MCP / CLI の両方から再利用可能。
 */

import type { FactRecord, PortKey } from './entities.js';
import type { DerivedStatus, EventKind, PortState, RiskLevel } from './port.js';

// ============================================================
// Scan
// ============================================================

/** 1 回のスキャンで観測された listening socket。 */
export interface PortObservation extends PortKey {
  pid: number;
  processName: string;
  commandLine: string;
}

/** keyString(key) → observation. */
export type ObservationMap = Map<string, PortObservation>;

/** OS のソケットテーブルを列挙するコンポーネント。 */
export interface SocketScanner {
  scan(hostId: string): Promise<ObservationMap>;
}

// ============================================================
// Reconcile
// ============================================================

/** diffFacts() が返す単一の状態遷移。 */
export type Transition =
  | { type: 'appeared'; observation: PortObservation }
  | {
      type: 'continued';
      fact: FactRecord;
      observation: PortObservation;
      processChanged: boolean;
      reappeared: boolean;
    }
  | { type: 'disappeared'; fact: FactRecord };

export interface ReconcileOptions {
  /** Append an `alive` heartbeat event on every continuation. */
  emitAliveEvents?: boolean;
  /** Cycle timestamp. Defaults to the current time. */
  now?: Date;
}

/** reconcile() の実行結果。各遷移の件数を返す。 */
export interface CycleSummary {
  hostId: string;
  startedAt: string;
  observed: number;
  appeared: number;
  continued: number;
  reappeared: number;
  processChanged: number;
  disappeared: number;
  eventsWritten: number;
}

/** Outcome reported by the scheduler for one cycle. Never throws. */
export type CycleOutcome = { ok: true; summary: CycleSummary } | { ok: false; error: string };

// ============================================================
// Merged view
// ============================================================

/** Fact ⊕ annotation ⊕ derived status ⊕ latest event, one per tuple. */
export interface MergedItem extends PortKey {
  factId?: string;
  firstSeenAt?: string;
  lastSeenAt?: string;
  lastDisappearedAt?: string;
  state: PortState | 'unknown';
  pid?: number;
  processName?: string;
  commandLine?: string;
  totalSeenCount: number;
  totalUptimeSeconds: number;
  uptimeHuman: string;

  annotationId?: string;
  title?: string;
  description?: string;
  owner?: string;
  riskLevel: RiskLevel | 'unknown';
  pinned: boolean;

  status: DerivedStatus;
  latestEventKind?: EventKind;
  latestEventAt?: string;
}

// ============================================================
// Diagnose
// ============================================================

/** 外部診断ツールの実行結果。タイムアウトは failed として扱う。 */
export interface DiagnosticResult {
  output: string;
  failed: boolean;
  timedOut: boolean;
}
