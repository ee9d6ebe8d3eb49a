/**
 * mimizuku — MCP Scan Tools
 *
 * run_scan: 全 Probe（または指定 Probe）を実行し、結果を履歴に保存して要約を返す。
 * list_probes: Registry の内容を返す。
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { ScanRepository } from '../../db/repository/scan-repository.js';
import { timeoutFor, DEFAULT_TIMEOUT_POLICY } from '../../engine/coordinator.js';
import { executeScan } from '../../engine/scan-service.js';
import type { McpServerDeps } from '../server.js';

export function registerScanTools(server: McpServer, deps: McpServerDeps): void {
  const scanRepo = new ScanRepository(deps.db);

  server.tool(
    'run_scan',
    'Run OSINT probes against a domain, store the scan in history and return the finding summary',
    {
      target: z.string().min(1).describe('Target domain (e.g. example.com)'),
      probes: z.array(z.string()).optional().describe('Probe names to run (default: all)'),
    },
    async ({ target, probes }) => {
      try {
        const { report, stored } = await executeScan(
          {
            registry: deps.registry,
            credentials: deps.credentials,
            logger: deps.logger,
            timeouts: deps.timeouts,
            repository: scanRepo,
          },
          { target, selection: probes },
        );
        const result = {
          scanId: stored?.id,
          target,
          summary: report.summary,
          probeStatus: report.probeStatus,
        };
        return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return {
          content: [{ type: 'text', text: `Scan failed: ${message}` }],
          isError: true,
        };
      }
    },
  );

  server.tool('list_probes', 'List available probes in execution order', {}, async () => {
    const policy = deps.timeouts ?? DEFAULT_TIMEOUT_POLICY;
    const result = deps.registry.map((d) => ({
      name: d.name,
      priority: d.priority,
      timeoutSeconds: timeoutFor(d, policy) / 1000,
      ...(d.credential !== undefined ? { credential: d.credential } : {}),
      description: d.description,
    }));
    return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
  });
}
