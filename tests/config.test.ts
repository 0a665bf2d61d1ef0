import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('環境変数がなければ既定値を使う', () => {
    expect(loadConfig({})).toEqual({
      dbPath: 'data/portmemo.db',
      hostId: 'local',
      scanSchedule: '* * * * *',
      emitAliveEvents: false,
      diagnose: { command: 'witr', timeoutMs: 2000 },
      logLevel: 'info',
    });
  });

  it('環境変数で上書きできる', () => {
    const config = loadConfig({
      PORTMEMO_DB_PATH: '/var/lib/portmemo/ports.db',
      PORTMEMO_HOST_ID: 'web-1',
      PORTMEMO_SCAN_SCHEDULE: '*/30 * * * * *',
      PORTMEMO_ALIVE_EVENTS: 'TRUE',
      PORTMEMO_DIAGNOSE_COMMAND: '/usr/local/bin/witr',
      PORTMEMO_DIAGNOSE_TIMEOUT_MS: '500',
      PORTMEMO_LOG_LEVEL: 'debug',
    });

    expect(config).toEqual({
      dbPath: '/var/lib/portmemo/ports.db',
      hostId: 'web-1',
      scanSchedule: '*/30 * * * * *',
      emitAliveEvents: true,
      diagnose: { command: '/usr/local/bin/witr', timeoutMs: 500 },
      logLevel: 'debug',
    });
  });

  it.each([
    ['1', true],
    ['yes', true],
    ['on', true],
    ['0', false],
    ['no', false],
    ['Off', false],
  ])('PORTMEMO_ALIVE_EVENTS=%s → %s', (value, expected) => {
    expect(loadConfig({ PORTMEMO_ALIVE_EVENTS: value }).emitAliveEvents).toBe(expected);
  });

  it('不正な値はすべて ConfigError に列挙する', () => {
    try {
      loadConfig({
        PORTMEMO_SCAN_SCHEDULE: 'every minute',
        PORTMEMO_ALIVE_EVENTS: 'maybe',
        PORTMEMO_DIAGNOSE_TIMEOUT_MS: '-1',
        PORTMEMO_LOG_LEVEL: 'verbose',
      });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      const issues = err instanceof ConfigError ? err.issues : [];
      expect(issues.map((i) => i.split(':')[0]).sort()).toEqual([
        'PORTMEMO_ALIVE_EVENTS',
        'PORTMEMO_DIAGNOSE_TIMEOUT_MS',
        'PORTMEMO_LOG_LEVEL',
        'PORTMEMO_SCAN_SCHEDULE',
      ]);
    }
  });
});
