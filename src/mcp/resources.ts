/**
 * portmemo — MCP Resources
 *
 * Read-only resources for browsing the monitored host.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import { listMergedPorts } from '../engine/merged-view.js';
import type { DerivedStatus } from '../types/port.js';

export function registerResources(server: McpServer, db: Database.Database, hostId: string): void {
  // 1. portmemo://ports — merged view of the monitored host
  server.resource(
    'ports',
    'portmemo://ports',
    { description: 'Facts merged with annotations, derived status and latest event' },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          mimeType: 'application/json',
          text: JSON.stringify(listMergedPorts(db, hostId), null, 2),
        },
      ],
    }),
  );

  // 2. portmemo://summary — counts per derived status and fact state
  server.resource(
    'summary',
    'portmemo://summary',
    { description: 'Port counts per derived status and per fact state' },
    async (uri) => {
      const items = listMergedPorts(db, hostId);
      const byStatus: Record<DerivedStatus, number> = {
        healthy: 0,
        suspicious: 0,
        ghost: 0,
        unknown: 0,
      };
      const byState: Record<string, number> = { active: 0, disappeared: 0, unknown: 0 };
      for (const item of items) {
        byStatus[item.status]++;
        byState[item.state] = (byState[item.state] ?? 0) + 1;
      }
      const summary = {
        hostId,
        total: items.length,
        pinned: items.filter((i) => i.pinned).length,
        byStatus,
        byState,
      };
      return {
        contents: [
          {
            uri: uri.href,
            mimeType: 'application/json',
            text: JSON.stringify(summary, null, 2),
          },
        ],
      };
    },
  );
}
