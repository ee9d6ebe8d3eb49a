/**
 * mimizuku — Stored entities
 *
 * スキャン履歴 DB に保存されるエンティティ（camelCase）。
 */

import type { ProbeStatus, Priority } from './probe.js';
import type { SeveritySummary } from './report.js';

// ============================================================
// scans
// ============================================================

/** 保存済みスキャン 1 件の概要。 */
export interface StoredScan {
  id: string;
  target: string;
  /** ISO 8601 (UTC) — スキャン開始時刻 */
  scanTime: string;
  finishedAt: string;
  summary: SeveritySummary;
  probeCount: number;
}

// ============================================================
// probe_outcomes
// ============================================================

/** 保存済み Probe Outcome 1 件（行表現）。 */
export interface StoredProbeOutcome {
  scanId: string;
  probe: string;
  /** Registry 順の位置 */
  position: number;
  priority: Priority;
  status: ProbeStatus;
  /** skipped の理由 / error のメッセージ。success では undefined */
  detail?: string;
  durationMs: number;
}

export interface FindScansOptions {
  target?: string;
  limit?: number;
}
