/**
 * portmemo — Logger
 *
 * stdout は MCP stdio トランスポートが使うため、ログは stderr (fd 2) に書く。
 */

import pino, { type Logger } from 'pino';

export type { Logger };

export function createLogger(level: string): Logger {
  return pino({ name: 'portmemo', level }, pino.destination(2));
}

/** A logger that discards everything (tests, library use). */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
