/**
 * portmemo — Input validation
 *
 * Store に触れる前に tuple key と注釈パッチを検証する。
 */

import type { ZodError } from 'zod';
import type { PortKey } from '../types/entities.js';
import type { AnnotationPatch } from '../types/port.js';
import { AnnotationPatchSchema, PortKeySchema } from '../types/port.js';
import { ValidationError } from './errors.js';

function toIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/** Validate a (host, protocol, port) tuple. Throws ValidationError. */
export function validateKey(input: unknown): PortKey {
  const parsed = PortKeySchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(toIssues(parsed.error));
  }
  return parsed.data;
}

/** Validate a partial annotation update. Throws ValidationError. */
export function validatePatch(input: unknown): AnnotationPatch {
  const parsed = AnnotationPatchSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(toIssues(parsed.error));
  }
  return parsed.data;
}
