/**
 * mimizuku — MCP Server
 *
 * Creates and configures the MCP server with all tools and resources.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import type { Logger } from 'pino';
import type { TimeoutPolicy } from '../engine/coordinator.js';
import type { CredentialLookup, ProbeDescriptor } from '../types/probe.js';
import { VERSION } from '../version.js';
import { registerScanTools } from './tools/scan.js';
import { registerHistoryTools } from './tools/history.js';
import { registerResources } from './resources.js';

export interface McpServerDeps {
  db: Database.Database;
  registry: readonly ProbeDescriptor[];
  credentials: CredentialLookup;
  logger: Logger;
  timeouts?: TimeoutPolicy;
}

/**
 * Create a fully configured MCP server with all mimizuku tools and resources.
 */
export function createMcpServer(deps: McpServerDeps): McpServer {
  const server = new McpServer({
    name: 'mimizuku',
    version: VERSION,
  });

  // Register tools (4 tools total)
  registerScanTools(server, deps); // run_scan + list_probes
  registerHistoryTools(server, deps.db); // list_scans + get_scan

  registerResources(server, deps.db);

  return server;
}
