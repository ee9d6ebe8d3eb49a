/**
 * mimizuku — Finding Aggregator
 *
 * ScanResult を重大度別バケットと Probe 実行状況の要約に平坦化する。
 * 純粋関数。同じ入力には常に同じ順序の同じ出力を返す。
 */

import type { AggregatedFinding, ScanResult, Severity } from '../types/probe.js';
import { SEVERITIES, isSeverity } from '../types/probe.js';
import type {
  AggregatedReport,
  FailedProbe,
  SeveritySummary,
  SkippedProbe,
  SuccessfulProbe,
} from '../types/report.js';

/** 不明・欠落した重大度は info に寄せる。 */
export function normalizeSeverity(value: unknown): Severity {
  return isSeverity(value) ? value : 'info';
}

function emptyBuckets(): Record<Severity, AggregatedFinding[]> {
  return { critical: [], high: [], medium: [], low: [], info: [] };
}

/**
 * バケット内の順序は挿入順（Registry 順 → Probe 内の発行順）。
 * 元の payload は変更しない（Finding はコピーして probe を付与する）。
 */
export function aggregateFindings(result: ScanResult): AggregatedReport {
  const buckets = emptyBuckets();
  const successful: SuccessfulProbe[] = [];
  const failed: FailedProbe[] = [];
  const skipped: SkippedProbe[] = [];

  for (const [name, outcome] of Object.entries(result.probes)) {
    switch (outcome.status) {
      case 'success': {
        successful.push({ name });
        for (const finding of outcome.data.findings) {
          const severity = normalizeSeverity(finding.severity);
          buckets[severity].push({ ...finding, severity, probe: name });
        }
        break;
      }
      case 'skipped':
        skipped.push({ name, reason: outcome.reason });
        break;
      case 'error':
        failed.push({ name, error: outcome.error });
        break;
      default: {
        // never 型による網羅性チェック
        const _exhaustive: never = outcome;
        throw new Error(`Unknown outcome: ${JSON.stringify(_exhaustive)}`);
      }
    }
  }

  const summary: SeveritySummary = {
    critical: buckets.critical.length,
    high: buckets.high.length,
    medium: buckets.medium.length,
    low: buckets.low.length,
    info: buckets.info.length,
    total: SEVERITIES.reduce((sum, severity) => sum + buckets[severity].length, 0),
  };

  return {
    findings: buckets,
    probeStatus: { successful, failed, skipped },
    summary,
  };
}

/** 重大度順に全 Finding を平坦化する（バケット内順序は維持）。 */
export function flattenFindings(report: AggregatedReport): AggregatedFinding[] {
  return SEVERITIES.flatMap((severity) => [...report.findings[severity]]);
}
