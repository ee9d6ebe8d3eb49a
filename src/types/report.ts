/**
 * mimizuku — Aggregation / report type definitions
 *
 * Aggregator の出力型。レポート生成・DB 保存・MCP 応答で共有する。
 */

import type { AggregatedFinding, Severity } from './probe.js';

/** 重大度ごとのバケット（critical → info の順）。 */
export type FindingsBySeverity = Readonly<Record<Severity, readonly AggregatedFinding[]>>;

export interface SuccessfulProbe {
  name: string;
}

export interface FailedProbe {
  name: string;
  error: string;
}

export interface SkippedProbe {
  name: string;
  reason: string;
}

/** Probe ごとの実行状況の要約。 */
export interface ProbeStatusSummary {
  successful: readonly SuccessfulProbe[];
  failed: readonly FailedProbe[];
  skipped: readonly SkippedProbe[];
}

/** 重大度別件数と合計。 */
export interface SeveritySummary {
  critical: number;
  high: number;
  medium: number;
  low: number;
  info: number;
  total: number;
}

/** Aggregator の出力。生成後は不変。 */
export interface AggregatedReport {
  findings: FindingsBySeverity;
  probeStatus: ProbeStatusSummary;
  summary: SeveritySummary;
}

/** 出力するレポート形式。 */
export const REPORT_FORMATS = ['all', 'json', 'html', 'markdown', 'pdf'] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];
