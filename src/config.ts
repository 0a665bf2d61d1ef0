/**
 * portmemo — Configuration
 *
 * 環境変数を Zod で検証して設定オブジェクトを返す。
 */

import cron from 'node-cron';
import { z } from 'zod';

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const BooleanFlag = z
  .string()
  .toLowerCase()
  .pipe(z.enum(['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off']))
  .transform((value) => ['1', 'true', 'yes', 'on'].includes(value));

const EnvSchema = z.object({
  PORTMEMO_DB_PATH: z.string().min(1).default('data/portmemo.db'),
  PORTMEMO_HOST_ID: z.string().min(1).default('local'),
  PORTMEMO_SCAN_SCHEDULE: z
    .string()
    .default('* * * * *')
    .refine((expr) => cron.validate(expr), { message: 'not a valid cron expression' }),
  PORTMEMO_ALIVE_EVENTS: BooleanFlag.default('false'),
  PORTMEMO_DIAGNOSE_COMMAND: z.string().min(1).default('witr'),
  PORTMEMO_DIAGNOSE_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  PORTMEMO_LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
});

export interface Config {
  dbPath: string;
  hostId: string;
  scanSchedule: string;
  emitAliveEvents: boolean;
  diagnose: {
    command: string;
    timeoutMs: number;
  };
  logLevel: string;
}

/** Build the configuration from environment variables. Throws ConfigError. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  const e = parsed.data;
  return {
    dbPath: e.PORTMEMO_DB_PATH,
    hostId: e.PORTMEMO_HOST_ID,
    scanSchedule: e.PORTMEMO_SCAN_SCHEDULE,
    emitAliveEvents: e.PORTMEMO_ALIVE_EVENTS,
    diagnose: {
      command: e.PORTMEMO_DIAGNOSE_COMMAND,
      timeoutMs: e.PORTMEMO_DIAGNOSE_TIMEOUT_MS,
    },
    logLevel: e.PORTMEMO_LOG_LEVEL,
  };
}
