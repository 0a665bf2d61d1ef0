/**
 * portmemo — MCP tool result helpers
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';
import { NotFoundError, ValidationError } from '../../engine/errors.js';

export function jsonResult(value: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

export function errorResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }], isError: true };
}

/**
 * Convert a thrown error into an `isError` result.
 * Unexpected errors are rethrown so the SDK reports them as internal failures.
 */
export function handleToolError(err: unknown): CallToolResult {
  if (err instanceof NotFoundError || err instanceof ValidationError) {
    return errorResult(err.message);
  }
  if (err instanceof ZodError) {
    return errorResult(
      `Validation failed: ${err.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
    );
  }
  throw err;
}
