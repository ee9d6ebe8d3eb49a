/**
 * mimizuku — HTML report
 *
 * 外部リソースを読み込まない単一ファイルの HTML。動的な文字列は全てエスケープする。
 */

import type { AggregatedFinding, ScanResult, Severity } from '../types/probe.js';
import { SEVERITIES } from '../types/probe.js';
import type { AggregatedReport } from '../types/report.js';
import { TOOL_NAME } from '../version.js';
import { TECH_CATEGORIES, analyzeTechStack } from './tech-stack.js';
import type { TechCategory } from './tech-stack.js';

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

const SEVERITY_COLORS: Readonly<Record<Severity, string>> = {
  critical: '#ef4444',
  high: '#f97316',
  medium: '#eab308',
  low: '#06b6d4',
  info: '#6b7280',
};

const CATEGORY_LABELS: Readonly<Record<TechCategory, string>> = {
  web_server: 'Web Server',
  backend: 'Backend',
  frontend: 'Frontend',
  cdn: 'CDN',
  hosting: 'Hosting',
  ssl_tls: 'SSL/TLS',
  email: 'Email',
  database: 'Database',
};

const STYLE = `
  * { margin: 0; padding: 0; box-sizing: border-box; }
  body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif; line-height: 1.6;
         color: #f1f5f9; background: #0f172a; }
  .container { max-width: 1200px; margin: 0 auto; padding: 40px 20px; }
  .header { background: #4f46e5; padding: 32px; border-radius: 12px; margin-bottom: 24px; }
  .header dl { display: grid; grid-template-columns: max-content 1fr; gap: 4px 16px; margin-top: 12px; }
  .cards { display: grid; grid-template-columns: repeat(auto-fit, minmax(140px, 1fr)); gap: 12px; margin-bottom: 24px; }
  .card { background: #1e293b; border-radius: 8px; padding: 16px; border-top: 4px solid var(--c); }
  .card .count { font-size: 2em; font-weight: 700; }
  section { background: #1e293b; border-radius: 8px; padding: 24px; margin-bottom: 24px; }
  h2 { margin-bottom: 16px; }
  table { width: 100%; border-collapse: collapse; }
  th, td { text-align: left; padding: 8px; border-bottom: 1px solid #334155; vertical-align: top; }
  .finding { border-left: 4px solid var(--c); padding: 8px 16px; margin-bottom: 12px; background: #0f172a; }
  .finding .meta { color: #cbd5e1; font-size: 0.9em; }
  .recommendation { margin-top: 6px; color: #a5b4fc; }
  .unknown { color: #64748b; font-style: italic; }
  pre { white-space: pre-wrap; word-break: break-all; font-size: 0.85em; background: #0f172a; padding: 12px; }
  details { margin-bottom: 8px; }
  summary { cursor: pointer; }
`;

function renderCards(report: AggregatedReport): string {
  const cards = SEVERITIES.map(
    (severity) =>
      `<div class="card" style="--c: ${SEVERITY_COLORS[severity]}"><div class="count">${report.summary[severity]}</div>` +
      `<div>${severity.toUpperCase()}</div></div>`,
  );
  cards.push(`<div class="card" style="--c: #4f46e5"><div class="count">${report.summary.total}</div><div>TOTAL</div></div>`);
  return `<div class="cards">${cards.join('')}</div>`;
}

function renderTechStack(result: ScanResult): string {
  const stack = analyzeTechStack(result);
  const rows = TECH_CATEGORIES.map((category) => {
    const entry = stack[category];
    const detected =
      entry.detected.length > 0
        ? entry.detected.map(escapeHtml).join('<br>')
        : '<span class="unknown">Unknown</span>';
    const evidence = entry.evidence.map(escapeHtml).join('<br>');
    return `<tr><td>${CATEGORY_LABELS[category]}</td><td>${detected}</td><td>${evidence}</td></tr>`;
  });
  return (
    '<section><h2>Technology Stack</h2><table><thead><tr><th>Layer</th><th>Detected</th><th>Evidence</th></tr></thead>' +
    `<tbody>${rows.join('')}</tbody></table></section>`
  );
}

function renderFinding(finding: AggregatedFinding): string {
  const recommendation = finding.recommendation
    ? `<div class="recommendation">Recommendation: ${escapeHtml(finding.recommendation)}</div>`
    : '';
  return (
    `<div class="finding" style="--c: ${SEVERITY_COLORS[finding.severity]}">` +
    `<h3>${escapeHtml(finding.title)}</h3>` +
    `<div class="meta">Probe: ${escapeHtml(finding.probe)} · Severity: ${finding.severity.toUpperCase()}</div>` +
    `<p>${escapeHtml(finding.description)}</p>${recommendation}</div>`
  );
}

function renderFindings(report: AggregatedReport): string {
  const blocks = SEVERITIES.filter((severity) => report.findings[severity].length > 0).map(
    (severity) =>
      `<h2>${severity.toUpperCase()} (${report.findings[severity].length})</h2>` +
      report.findings[severity].map(renderFinding).join(''),
  );
  const body = blocks.length > 0 ? blocks.join('') : '<p class="unknown">No findings</p>';
  return `<section><h2>Findings</h2>${body}</section>`;
}

function renderProbeStatus(report: AggregatedReport): string {
  const { successful, failed, skipped } = report.probeStatus;
  const rows = [
    ...successful.map((p) => `<tr><td>${escapeHtml(p.name)}</td><td>success</td><td></td></tr>`),
    ...failed.map((p) => `<tr><td>${escapeHtml(p.name)}</td><td>error</td><td>${escapeHtml(p.error)}</td></tr>`),
    ...skipped.map((p) => `<tr><td>${escapeHtml(p.name)}</td><td>skipped</td><td>${escapeHtml(p.reason)}</td></tr>`),
  ];
  return (
    '<section><h2>Probe Status</h2><table><thead><tr><th>Probe</th><th>Status</th><th>Detail</th></tr></thead>' +
    `<tbody>${rows.join('')}</tbody></table></section>`
  );
}

function renderRawData(result: ScanResult): string {
  const blocks = Object.entries(result.probes).map(
    ([name, outcome]) =>
      `<details><summary>${escapeHtml(name)} (${outcome.status})</summary>` +
      `<pre>${escapeHtml(JSON.stringify(outcome, null, 2))}</pre></details>`,
  );
  return `<section><h2>Raw Probe Output</h2>${blocks.join('')}</section>`;
}

export function renderHtmlReport(result: ScanResult, report: AggregatedReport, generatedAt: Date): string {
  const target = escapeHtml(result.target);
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>OSINT Report - ${target}</title>
<style>${STYLE}</style>
</head>
<body>
<div class="container">
<div class="header">
<h1>OSINT Reconnaissance Report</h1>
<dl>
<dt>Target</dt><dd>${target}</dd>
<dt>Scan Time</dt><dd>${escapeHtml(result.scanTime)}</dd>
<dt>Generated</dt><dd>${escapeHtml(generatedAt.toISOString())}</dd>
</dl>
</div>
${renderCards(report)}
${renderTechStack(result)}
${renderFindings(report)}
${renderProbeStatus(report)}
${renderRawData(result)}
<footer>Generated by ${escapeHtml(TOOL_NAME)}</footer>
</div>
</body>
</html>
`;
}
