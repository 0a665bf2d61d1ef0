/**
 * portmemo — テスト用ヘルパー
 */

import Database from 'better-sqlite3';
import pino from 'pino';
import { migrateDatabase } from '../../src/db/migrate.js';
import type { ObservationMap, PortObservation, SocketScanner } from '../../src/types/engine.js';
import type { Protocol } from '../../src/types/port.js';
import { keyString } from '../../src/types/port.js';

export function openDb(): InstanceType<typeof Database> {
  const db = new Database(':memory:');
  migrateDatabase(db);
  return db;
}

export function observation(
  port: number,
  processName: string,
  overrides: Partial<PortObservation> = {},
): PortObservation {
  return {
    hostId: 'local',
    protocol: 'tcp',
    port,
    pid: 1000 + port,
    processName,
    commandLine: `/usr/bin/${processName}`,
    ...overrides,
  };
}

export function observations(...items: PortObservation[]): ObservationMap {
  return new Map(items.map((item) => [keyString(item), item]));
}

export function key(port: number, protocol: Protocol = 'tcp', hostId = 'local') {
  return { hostId, protocol, port };
}

/** Returns queued scan results in order; a thrown Error entry makes scan() reject. */
export class FakeScanner implements SocketScanner {
  readonly calls: string[] = [];
  private readonly results: Array<ObservationMap | Error>;

  constructor(...results: Array<ObservationMap | Error>) {
    this.results = results;
  }

  push(result: ObservationMap | Error): void {
    this.results.push(result);
  }

  async scan(hostId: string): Promise<ObservationMap> {
    this.calls.push(hostId);
    const next = this.results.shift() ?? new Map();
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

export function at(iso: string): Date {
  return new Date(iso);
}

export interface LogLine {
  level: number;
  msg: string;
}

/** pino の JSON 出力を行単位で捕まえる。 */
export function captureLogger() {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(message: string) {
        lines.push(JSON.parse(message) as LogLine);
      },
    },
  );
  return { logger, lines };
}
