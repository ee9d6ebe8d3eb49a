/**
 * mimizuku — JSON report
 */

import type { ScanResult } from '../types/probe.js';
import type { AggregatedReport } from '../types/report.js';
import { toBoundaryObject } from '../types/probe.js';
import { TOOL_NAME } from '../version.js';

export interface JsonReport {
  metadata: {
    target: string;
    scan_time: string;
    generated_at: string;
    tool: string;
  };
  summary: AggregatedReport['summary'];
  probe_status: AggregatedReport['probeStatus'];
  findings: AggregatedReport['findings'];
  raw_data: ReturnType<typeof toBoundaryObject>['probes'];
}

export function buildJsonReport(result: ScanResult, report: AggregatedReport, generatedAt: Date): JsonReport {
  const boundary = toBoundaryObject(result);
  return {
    metadata: {
      target: boundary.target,
      scan_time: boundary.scan_time,
      generated_at: generatedAt.toISOString(),
      tool: TOOL_NAME,
    },
    summary: report.summary,
    probe_status: report.probeStatus,
    findings: report.findings,
    raw_data: boundary.probes,
  };
}

export function renderJsonReport(result: ScanResult, report: AggregatedReport, generatedAt: Date): string {
  return `${JSON.stringify(buildJsonReport(result, report, generatedAt), null, 2)}\n`;
}
