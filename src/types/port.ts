/**
 * portmemo — Port type system
 *
 * 列挙値（protocol / state / event kind / risk level / derived status）と
 * 入力検証用の Zod スキーマ。
 */

import { z } from 'zod';

// ============================================================
// 列挙
// ============================================================

export const PROTOCOLS = ['tcp', 'udp'] as const;
export type Protocol = (typeof PROTOCOLS)[number];

export const PORT_STATES = ['active', 'disappeared'] as const;
export type PortState = (typeof PORT_STATES)[number];

export const EVENT_KINDS = [
  'appeared',
  'alive',
  'process-changed',
  'disappeared',
  'acknowledged',
  'diagnosed',
] as const;
export type EventKind = (typeof EVENT_KINDS)[number];

/** Kinds that move a fact between active and disappeared. */
export const LIFECYCLE_EVENT_KINDS: readonly EventKind[] = [
  'appeared',
  'process-changed',
  'disappeared',
];

export const RISK_LEVELS = ['trusted', 'expected', 'suspicious'] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

export const DERIVED_STATUSES = ['healthy', 'suspicious', 'ghost', 'unknown'] as const;
export type DerivedStatus = (typeof DERIVED_STATUSES)[number];

export const MIN_PORT = 1;
export const MAX_PORT = 65535;

// ============================================================
// Zod スキーマ
// ============================================================

export const ProtocolSchema = z.enum(PROTOCOLS);
export const RiskLevelSchema = z.enum(RISK_LEVELS);

export const PortNumberSchema = z.number().int().min(MIN_PORT).max(MAX_PORT);

export const PortKeySchema = z.object({
  hostId: z.string().min(1),
  protocol: ProtocolSchema,
  port: PortNumberSchema,
});

/** Partial update of an annotation. Unknown fields are rejected. */
export const AnnotationPatchSchema = z
  .object({
    title: z.string(),
    description: z.string(),
    owner: z.string(),
    riskLevel: RiskLevelSchema,
    pinned: z.boolean(),
  })
  .partial()
  .strict();
export type AnnotationPatch = z.infer<typeof AnnotationPatchSchema>;

/** Tuple key → stable string used for Map lookups (`local/tcp/8080`). */
export function keyString(key: { hostId: string; protocol: string; port: number }): string {
  return `${key.hostId}/${key.protocol}/${key.port}`;
}
