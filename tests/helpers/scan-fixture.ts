/**
 * レポート・DB・MCP テスト共通のスキャン結果。
 */

import { aggregateFindings } from '../../src/engine/aggregator.js';
import type { ScanResult } from '../../src/types/probe.js';
import type { AggregatedReport } from '../../src/types/report.js';

export const SCAN_TIME = '2024-05-01T12:00:00.000Z';

export function sampleResult(target = 'example.com', scanTime = SCAN_TIME): ScanResult {
  return {
    target,
    scanTime,
    probes: {
      dns: {
        status: 'success',
        priority: 'critical',
        durationMs: 120,
        data: {
          records: { A: ['192.0.2.10'], NS: ['ns1.example.net'], MX: ['10 aspmx.l.google.com'] },
          findings: [
            {
              severity: 'medium',
              title: 'No DMARC record',
              description: 'No DMARC policy published at _dmarc.example.com',
              recommendation: 'Publish a DMARC record',
            },
          ],
        },
      },
      http: {
        status: 'success',
        priority: 'high',
        durationMs: 300,
        data: {
          http: { accessible: true, headers: { server: 'nginx/1.25.3' } },
          https: { accessible: true, headers: { 'cf-ray': '8a1b2c3d', 'x-powered-by': 'Express' } },
          findings: [
            { severity: 'high', title: 'No HTTP to HTTPS redirect', description: 'HTTP site does not redirect to HTTPS' },
            { severity: 'low', title: 'Server header exposed', description: 'Server header reveals: <nginx>' },
          ],
        },
      },
      ports: { status: 'error', priority: 'critical', durationMs: 5, error: 'Could not resolve hostname' },
      shodan: {
        status: 'skipped',
        priority: 'high',
        durationMs: 1,
        reason: 'Missing capability: shodan credential is not configured',
      },
    },
  };
}

export function sampleReport(result: ScanResult = sampleResult()): AggregatedReport {
  return aggregateFindings(result);
}
