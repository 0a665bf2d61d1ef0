/**
 * portmemo - Repository input / update type definitions
 *
 * Create types use `Omit` to strip auto-generated columns (id, createdAt, updatedAt).
 * Update types use `Partial<Pick<...>>` to allow selective field updates.
 */

import type { AnnotationRecord, FactRecord, TimelineEvent } from './entities.js';

// ============================================================
// Create input types
// ============================================================

/** Input for creating a new FactRecord. */
export type CreateFactInput = Omit<FactRecord, 'id'>;

/** Input for appending a TimelineEvent. */
export type CreateEventInput = Omit<TimelineEvent, 'id'>;

/** Input for creating a new AnnotationRecord. */
export type CreateAnnotationInput = Omit<AnnotationRecord, 'id' | 'createdAt' | 'updatedAt'>;

// ============================================================
// Update input types
// ============================================================

/** Input for mutating an existing FactRecord in place. */
export type UpdateFactInput = Partial<
  Pick<
    FactRecord,
    | 'lastSeenAt'
    | 'lastDisappearedAt'
    | 'state'
    | 'pid'
    | 'processName'
    | 'commandLine'
    | 'totalSeenCount'
    | 'totalUptimeSeconds'
  >
>;

/** Input for updating an existing AnnotationRecord. */
export type UpdateAnnotationInput = Partial<
  Pick<AnnotationRecord, 'title' | 'description' | 'owner' | 'riskLevel' | 'pinned'>
>;
