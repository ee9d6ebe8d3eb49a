/**
 * mimizuku — Markdown report
 */

import type { ScanResult } from '../types/probe.js';
import { SEVERITIES } from '../types/probe.js';
import type { AggregatedReport } from '../types/report.js';
import { TOOL_NAME } from '../version.js';

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function statusLine<T extends { name: string }>(label: string, entries: readonly T[], detail?: (entry: T) => string): string {
  if (entries.length === 0) {
    return `- **${label} (0):** none`;
  }
  const items = entries.map((entry) => (detail ? `${entry.name} (${detail(entry)})` : entry.name));
  return `- **${label} (${entries.length}):** ${items.join(', ')}`;
}

export function renderMarkdownReport(result: ScanResult, report: AggregatedReport, generatedAt: Date): string {
  const { summary, probeStatus } = report;
  const lines: string[] = [
    '# OSINT Reconnaissance Report',
    '',
    '## Target Information',
    `- **Target:** ${result.target}`,
    `- **Scan Time:** ${result.scanTime}`,
    `- **Generated:** ${generatedAt.toISOString()}`,
    '',
    '## Executive Summary',
    '',
    '| Severity | Count |',
    '|----------|-------|',
    ...SEVERITIES.map((severity) => `| ${capitalize(severity)} | ${summary[severity]} |`),
    `| **Total** | **${summary.total}** |`,
    '',
    '## Probe Status',
    '',
    statusLine('Successful', probeStatus.successful),
    statusLine('Failed', probeStatus.failed, (p) => p.error),
    statusLine('Skipped', probeStatus.skipped, (p) => p.reason),
    '',
  ];

  for (const severity of SEVERITIES) {
    const findings = report.findings[severity];
    if (findings.length === 0) continue;

    lines.push(`## ${capitalize(severity)} Findings (${findings.length})`, '');
    for (const finding of findings) {
      lines.push(
        `### ${finding.title}`,
        '',
        `**Probe:** ${finding.probe}  `,
        `**Severity:** ${severity.toUpperCase()}  `,
        '',
        finding.description,
        '',
      );
      if (finding.recommendation) {
        lines.push(`**Recommendation:** ${finding.recommendation}`, '');
      }
      lines.push('---', '');
    }
  }

  lines.push(`*Generated by ${TOOL_NAME}*`, '');
  return lines.join('\n');
}
