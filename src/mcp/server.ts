/**
 * portmemo — MCP Server
 *
 * Creates and configures the MCP server with all tools and resources.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import type { DiagnoseOptions } from '../engine/diagnoser.js';
import { registerPortTools } from './tools/ports.js';
import { registerMemoryTools } from './tools/memory.js';
import { registerScanTools } from './tools/scan.js';
import type { CycleTrigger } from './tools/scan.js';
import { registerSnapshotTool } from './tools/snapshot.js';
import { registerResources } from './resources.js';

export interface McpServerDeps {
  /** Host used when a tool call omits hostId. */
  hostId: string;
  trigger: CycleTrigger;
  diagnose: DiagnoseOptions;
}

/**
 * Create a fully configured MCP server with all portmemo tools and resources.
 *
 * @param db - The better-sqlite3 database instance
 * @param deps - Scheduler trigger, default host and diagnostic tool settings
 * @returns Configured McpServer instance
 */
export function createMcpServer(db: Database.Database, deps: McpServerDeps): McpServer {
  const server = new McpServer({
    name: 'portmemo',
    version: '0.1.0',
  });

  // Register tools (8 tools total)
  registerPortTools(server, db, deps.hostId); // list_ports + get_timeline
  registerMemoryTools(server, db, deps.hostId); // annotate + delete_port + acknowledge
  registerScanTools(server, db, deps.hostId, deps.trigger, deps.diagnose); // trigger_scan + diagnose
  registerSnapshotTool(server, db);

  // Register resources
  registerResources(server, db, deps.hostId);

  return server;
}
