/**
 * portmemo — 起動処理
 *
 * 設定を読み込み、DB をマイグレーションし、定期スキャンを開始してから
 * stdio トランスポートで接続する。設定エラーを含む起動失敗は
 * fatal ログに残して false を返す。
 */

import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { createLogger, type Logger } from './logger.js';
import { migrateDatabase } from './db/migrate.js';
import { SsSocketScanner } from './engine/scanner.js';
import { ReconcileScheduler } from './engine/scheduler.js';
import { createMcpServer } from './mcp/server.js';

export async function main(
  env: NodeJS.ProcessEnv = process.env,
  startupLogger: Logger = createLogger('info'),
): Promise<boolean> {
  let logger = startupLogger;
  try {
    const config = loadConfig(env);
    logger = createLogger(config.logLevel);

    fs.mkdirSync(path.dirname(path.resolve(config.dbPath)), { recursive: true });
    const db = new Database(config.dbPath);
    migrateDatabase(db);
    logger.info({ dbPath: config.dbPath }, 'database ready');

    const scheduler = new ReconcileScheduler({
      db,
      scanner: new SsSocketScanner({ logger }),
      hostId: config.hostId,
      logger,
      schedule: config.scanSchedule,
      reconcileOptions: { emitAliveEvents: config.emitAliveEvents },
    });

    const server = createMcpServer(db, {
      hostId: config.hostId,
      trigger: scheduler,
      diagnose: config.diagnose,
    });

    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'shutting down');
      scheduler.stop();
      void scheduler.idle().then(() => {
        db.close();
        process.exit(0);
      });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    scheduler.start();
    await server.connect(new StdioServerTransport());
    return true;
  } catch (err) {
    logger.fatal({ err }, 'failed to start');
    return false;
  }
}
