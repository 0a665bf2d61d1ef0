/**
 * portmemo — Engine error types
 */

import type { PortKey } from '../types/entities.js';
import { keyString } from '../types/port.js';

export class PortmemoError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PortmemoError';
  }
}

/** The OS socket table could not be queried. The cycle must not mutate anything. */
export class ScanError extends PortmemoError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ScanError';
  }
}

/** No FactRecord (or AnnotationRecord) exists for the requested tuple. */
export class NotFoundError extends PortmemoError {
  readonly key: PortKey;

  constructor(what: string, key: PortKey) {
    super(`${what} not found: ${keyString(key)}`);
    this.name = 'NotFoundError';
    this.key = key;
  }
}

/** Input rejected before touching the store. */
export class ValidationError extends PortmemoError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Validation failed: ${issues.join('; ')}`);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}
