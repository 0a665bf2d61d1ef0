/**
 * portmemo — Annotation Store operations
 *
 * 注釈は tuple で upsert する。fact とは外部キーで結ばれていないため、
 * fact の削除は注釈に影響せず、その逆も同じ。
 */

import type Database from 'better-sqlite3';
import type { AnnotationRecord, PortKey } from '../types/entities.js';
import { AnnotationRepository } from '../db/repository/annotation-repository.js';
import { FactRepository } from '../db/repository/fact-repository.js';
import { keyString } from '../types/port.js';
import { PortmemoError } from './errors.js';
import { validateKey, validatePatch } from './validation.js';

/**
 * tuple の注釈を更新、なければ作成する。
 *
 * patch に含まれるフィールドだけを変更する。新規作成時の既定値は
 * riskLevel = expected、pinned = false、テキスト項目は空文字。
 * key と patch はどちらも DB に触れる前に検証する（ValidationError）。
 */
export function upsertAnnotation(
  db: Database.Database,
  key: PortKey,
  patch: unknown,
): AnnotationRecord {
  const validKey = validateKey(key);
  const validPatch = validatePatch(patch);
  const repo = new AnnotationRepository(db);

  const run = db.transaction((): AnnotationRecord => {
    const existing = repo.findByKey(validKey);
    if (!existing) {
      return repo.create({
        ...validKey,
        title: validPatch.title ?? '',
        description: validPatch.description ?? '',
        owner: validPatch.owner ?? '',
        riskLevel: validPatch.riskLevel ?? 'expected',
        pinned: validPatch.pinned ?? false,
      });
    }
    const updated = repo.update(existing.id, validPatch);
    if (!updated) {
      throw new Error(`Annotation vanished during update: ${existing.id}`);
    }
    return updated;
  });

  return run();
}

/** Delete only the annotation of a tuple. Returns true if one existed. */
export function deleteAnnotation(db: Database.Database, key: PortKey): boolean {
  return new AnnotationRepository(db).deleteByKey(validateKey(key));
}

export interface DeleteTupleResult {
  factDeleted: boolean;
  annotationDeleted: boolean;
}

/**
 * fact（とそのタイムライン）と注釈をそれぞれ独立に削除する。
 * 片方が存在しなくても、片方の削除が失敗しても、もう片方は削除を試みる。
 * 失敗があれば両方を試した後で PortmemoError を投げる。
 * 現在 listen 中のポートは次のサイクルで新しい fact として再登場する。
 */
export function deleteTuple(db: Database.Database, key: PortKey): DeleteTupleResult {
  const validKey = validateKey(key);
  const failures: unknown[] = [];
  const attempt = (remove: () => boolean): boolean => {
    try {
      return remove();
    } catch (err) {
      failures.push(err);
      return false;
    }
  };

  const factDeleted = attempt(() => new FactRepository(db).deleteByKey(validKey));
  const annotationDeleted = attempt(() => new AnnotationRepository(db).deleteByKey(validKey));
  if (failures.length > 0) {
    const cause = failures.length === 1 ? failures[0] : new AggregateError(failures);
    throw new PortmemoError(
      `Delete incomplete for ${keyString(validKey)} (fact: ${factDeleted}, annotation: ${annotationDeleted})`,
      { cause },
    );
  }
  return { factDeleted, annotationDeleted };
}
