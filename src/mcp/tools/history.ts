/**
 * mimizuku — MCP History Tools
 *
 * list_scans / get_scan: 保存済みスキャンの参照。
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import { z } from 'zod';
import { ScanRepository } from '../../db/repository/scan-repository.js';
import { aggregateFindings } from '../../engine/aggregator.js';

export function registerHistoryTools(server: McpServer, db: Database.Database): void {
  const scanRepo = new ScanRepository(db);

  server.tool(
    'list_scans',
    'List stored scans, newest first',
    {
      target: z.string().optional().describe('Only scans of this target'),
      limit: z.number().int().positive().optional().describe('Maximum number of scans'),
    },
    async ({ target, limit }) => {
      const scans = scanRepo.findAll({ target, limit });
      return { content: [{ type: 'text', text: JSON.stringify(scans, null, 2) }] };
    },
  );

  server.tool(
    'get_scan',
    'Get a stored scan with its probe status and findings grouped by severity',
    {
      scanId: z.string().describe('Scan ID returned by run_scan or list_scans'),
    },
    async ({ scanId }) => {
      const scan = scanRepo.findById(scanId);
      const result = scanRepo.loadResult(scanId);
      if (scan === undefined || result === undefined) {
        return {
          content: [{ type: 'text', text: `Scan not found: ${scanId}` }],
          isError: true,
        };
      }
      const report = aggregateFindings(result);
      const detail = {
        ...scan,
        probeStatus: report.probeStatus,
        findings: report.findings,
      };
      return { content: [{ type: 'text', text: JSON.stringify(detail, null, 2) }] };
    },
  );
}
