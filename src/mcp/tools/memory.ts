/**
 * portmemo — MCP memory tools
 *
 * annotate / delete_port / acknowledge。オペレータの明示的な操作だけがここを通る。
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import { z } from 'zod';
import { deleteTuple, upsertAnnotation } from '../../engine/port-memory.js';
import { acknowledge } from '../../engine/timeline.js';
import { RiskLevelSchema } from '../../types/port.js';
import { handleToolError, jsonResult } from './respond.js';
import { keyParams, toKey } from './key.js';

export function registerMemoryTools(server: McpServer, db: Database.Database, hostId: string): void {
  server.tool(
    'annotate',
    'Create or update the annotation of a port. Only the supplied fields change; new annotations default to riskLevel=expected, pinned=false',
    {
      ...keyParams,
      title: z.string().optional(),
      description: z.string().optional(),
      owner: z.string().optional(),
      riskLevel: RiskLevelSchema.optional().describe('trusted | expected | suspicious'),
      pinned: z.boolean().optional(),
    },
    async ({ hostId: requestedHostId, protocol, port, ...fields }) => {
      const patch = Object.fromEntries(
        Object.entries(fields).filter(([, value]) => value !== undefined),
      );
      try {
        const annotation = upsertAnnotation(
          db,
          toKey(hostId, { hostId: requestedHostId, protocol, port }),
          patch,
        );
        return jsonResult(annotation);
      } catch (err) {
        return handleToolError(err);
      }
    },
  );

  server.tool(
    'delete_port',
    'Delete the fact (with its timeline) and the annotation of a port. A port that is still listening reappears on the next scan',
    keyParams,
    async (args) => {
      try {
        return jsonResult(deleteTuple(db, toKey(hostId, args)));
      } catch (err) {
        return handleToolError(err);
      }
    },
  );

  server.tool(
    'acknowledge',
    'Record that the operator has seen the latest warning on a port',
    keyParams,
    async (args) => {
      try {
        return jsonResult(acknowledge(db, toKey(hostId, args)));
      } catch (err) {
        return handleToolError(err);
      }
    },
  );
}
