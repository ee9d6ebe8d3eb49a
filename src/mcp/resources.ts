/**
 * mimizuku — MCP Resources
 *
 * Read-only resources for browsing the scan history.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import { ScanRepository } from '../db/repository/scan-repository.js';

export function registerResources(server: McpServer, db: Database.Database): void {
  const scanRepo = new ScanRepository(db);

  // mimizuku://scans — Stored scan list (newest first)
  server.resource(
    'scans',
    'mimizuku://scans',
    { description: 'Stored OSINT scans with severity summaries, newest first' },
    async (uri) => {
      const scans = scanRepo.findAll();
      return {
        contents: [
          {
            uri: uri.href,
            mimeType: 'application/json',
            text: JSON.stringify(scans, null, 2),
          },
        ],
      };
    },
  );
}
