/**
 * portmemo — MCP snapshot tool
 *
 * 旧エクスポート互換の JSON ファイルへの書き出しと取り込み。
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { exportSnapshot, importSnapshot } from '../../engine/snapshot.js';
import { errorResult, handleToolError, jsonResult } from './respond.js';

export function registerSnapshotTool(server: McpServer, db: Database.Database): void {
  server.tool(
    'snapshot',
    'Export all facts, annotations and events to a JSON file, or import such a file. Actions: export, import',
    {
      action: z.enum(['export', 'import']),
      path: z.string().min(1).describe('Path to the JSON snapshot file'),
    },
    async ({ action, path: filePath }) => {
      const resolved = path.resolve(filePath);

      switch (action) {
        case 'export': {
          const snapshot = exportSnapshot(db);
          fs.writeFileSync(resolved, JSON.stringify(snapshot, null, 2), 'utf-8');
          return jsonResult({
            path: resolved,
            runtimes: snapshot.runtimes.length,
            notes: snapshot.notes.length,
            events: snapshot.events.length,
          });
        }
        case 'import': {
          let data: unknown;
          try {
            data = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
          } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            return errorResult(`Cannot read snapshot ${resolved}: ${message}`);
          }
          try {
            return jsonResult(importSnapshot(db, data));
          } catch (err) {
            return handleToolError(err);
          }
        }
      }
    },
  );
}
