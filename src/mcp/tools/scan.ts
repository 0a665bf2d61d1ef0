/**
 * portmemo — MCP scan tools
 *
 * trigger_scan: 手動でサイクルを 1 回実行し、その結果を返す
 * diagnose: 外部診断ツールを実行して diagnosed イベントを記録する
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import type { DiagnoseOptions } from '../../engine/diagnoser.js';
import { diagnose } from '../../engine/diagnoser.js';
import type { CycleOutcome } from '../../types/engine.js';
import { errorResult, handleToolError, jsonResult } from './respond.js';
import { keyParams, toKey } from './key.js';

/** The part of the scheduler the gateway needs. */
export interface CycleTrigger {
  runNow(): Promise<CycleOutcome>;
}

export function registerScanTools(
  server: McpServer,
  db: Database.Database,
  hostId: string,
  trigger: CycleTrigger,
  diagnoseOptions: DiagnoseOptions,
): void {
  server.tool(
    'trigger_scan',
    'Run one reconciliation cycle now (waits for any cycle in progress) and report its outcome',
    {},
    async () => {
      const outcome = await trigger.runNow();
      if (!outcome.ok) {
        return errorResult(`Reconciliation cycle failed: ${outcome.error}`);
      }
      return jsonResult(outcome.summary);
    },
  );

  server.tool(
    'diagnose',
    'Run the external diagnostic tool for a port and record its output on the timeline. The protocol is required',
    keyParams,
    async (args) => {
      try {
        const { result, event } = await diagnose(db, toKey(hostId, args), diagnoseOptions);
        return { ...jsonResult({ ...result, eventId: event.id }), isError: result.failed };
      } catch (err) {
        return handleToolError(err);
      }
    },
  );
}
