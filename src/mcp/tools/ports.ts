/**
 * portmemo — MCP read tools
 *
 * list_ports: fact ⊕ 注釈 ⊕ 導出ステータスの結合ビュー
 * get_timeline: tuple のタイムライン（新しい順）
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import { z } from 'zod';
import { listMergedPorts } from '../../engine/merged-view.js';
import { getTimeline } from '../../engine/timeline.js';
import { DERIVED_STATUSES } from '../../types/port.js';
import { handleToolError, jsonResult } from './respond.js';
import { keyParams, toKey } from './key.js';

export function registerPortTools(server: McpServer, db: Database.Database, hostId: string): void {
  server.tool(
    'list_ports',
    'List every known port of a host: observed facts merged with annotations, derived status and latest event',
    {
      hostId: z.string().min(1).optional().describe('Host identifier (defaults to the monitored host)'),
      status: z.enum(DERIVED_STATUSES).optional().describe('Only return ports with this derived status'),
    },
    async ({ hostId: requestedHostId, status }) => {
      const items = listMergedPorts(db, requestedHostId ?? hostId);
      return jsonResult(status ? items.filter((item) => item.status === status) : items);
    },
  );

  server.tool(
    'get_timeline',
    'Get the event timeline of a port, newest first',
    keyParams,
    async (args) => {
      try {
        return jsonResult(getTimeline(db, toKey(hostId, args)));
      } catch (err) {
        return handleToolError(err);
      }
    },
  );
}
