/**
 * portmemo — Status Deriver
 *
 * Fact（観測）と Annotation（記憶）の組み合わせから表示用ステータスを導出する。
 * 純粋関数。結果は永続化しない。
 */

import type { AnnotationRecord, FactRecord } from '../types/entities.js';
import type { DerivedStatus } from '../types/port.js';

type FactState = Pick<FactRecord, 'state'>;
type AnnotationRisk = Pick<AnnotationRecord, 'riskLevel'>;

/**
 * 上から順に評価し、最初に一致したルールを返す。
 *
 * 1. fact なし                         → unknown（注釈だけの「記憶」）
 * 2. active + trusted                  → healthy
 * 3. active + 注釈なし                  → suspicious
 * 4. active + suspicious               → suspicious
 * 5. active + その他の注釈              → healthy
 * 6. disappeared                       → ghost（注釈に関係なく）
 */
export function deriveStatus(
  fact: FactState | undefined,
  annotation: AnnotationRisk | undefined,
): DerivedStatus {
  if (!fact) {
    return 'unknown';
  }

  switch (fact.state) {
    case 'active':
      if (!annotation) return 'suspicious';
      return annotation.riskLevel === 'suspicious' ? 'suspicious' : 'healthy';
    case 'disappeared':
      return 'ghost';
    default: {
      const _exhaustive: never = fact.state;
      throw new Error(`Unknown fact state: ${String(_exhaustive)}`);
    }
  }
}
