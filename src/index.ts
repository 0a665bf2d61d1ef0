/**
 * portmemo — listening-port memory
 *
 * MCP Server エントリポイント。
 */

import { main } from './main.js';

if (!(await main())) {
  process.exit(1);
}
