/**
 * mimizuku — Probe contract types
 *
 * Probe / Outcome / ScanResult の型定義。
 * Engine 層（runner, coordinator, aggregator）と各 Probe 実装、
 * レポート・DB・MCP 層の全てから参照される。
 */

import type { Logger } from 'pino';

// ============================================================
// 重大度・優先度
// ============================================================

/** Finding の重大度（高い順）。 */
export const SEVERITIES = ['critical', 'high', 'medium', 'low', 'info'] as const;
export type Severity = (typeof SEVERITIES)[number];

/** Probe の優先度タグ。 */
export const PRIORITIES = ['critical', 'high', 'medium', 'low'] as const;
export type Priority = (typeof PRIORITIES)[number];

export function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && (SEVERITIES as readonly string[]).includes(value);
}

export function isPriority(value: unknown): value is Priority {
  return typeof value === 'string' && (PRIORITIES as readonly string[]).includes(value);
}

// ============================================================
// Finding
// ============================================================

/** Probe が生成する単一の観測結果。 */
export interface Finding {
  severity: Severity;
  title: string;
  description: string;
  data?: unknown;
  recommendation?: string;
}

/** Aggregator が発生元 Probe 名を付与した Finding。 */
export interface AggregatedFinding extends Finding {
  probe: string;
}

// ============================================================
// Probe 契約
// ============================================================

/** 外部サービス名 → 認証情報。未設定なら undefined。 */
export type CredentialLookup = (service: string) => string | undefined;

/** Probe の戻り値。findings 以外の形は Probe ごとに自由。 */
export interface ProbePayload {
  findings: Finding[];
  [key: string]: unknown;
}

/**
 * Finding として扱えるオブジェクトかどうか。
 * severity の不正値は Aggregator が info に寄せるのでここでは見ない。
 */
export function isFindingLike(value: unknown): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    'title' in value &&
    typeof value.title === 'string' &&
    'description' in value &&
    typeof value.description === 'string'
  );
}

/** findings 配列を持ち、その全要素が Finding として扱えるオブジェクトかどうか。 */
export function isProbePayload(value: unknown): value is ProbePayload {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    'findings' in value &&
    Array.isArray(value.findings) &&
    value.findings.every(isFindingLike)
  );
}

/** scan() に渡される実行コンテキスト。 */
export interface ProbeContext {
  /** タイムアウトまたは中断時に abort される。全ネットワーク呼び出しで尊重すること。 */
  signal: AbortSignal;
  logger: Logger;
}

/** 独立した偵察手法 1 つ分。 */
export interface Probe {
  scan(target: string, credentials: CredentialLookup, context: ProbeContext): Promise<ProbePayload>;
}

/** Registry に登録される Probe 定義。登録後は不変。 */
export interface ProbeDescriptor {
  /** 一意な識別子（--probes で指定する名前） */
  readonly name: string;
  readonly priority: Priority;
  /** ポートスキャン系 Probe は長いタイムアウトを使う */
  readonly portScan?: boolean;
  /** 必要な外部サービスの認証情報（list-probes 表示用） */
  readonly credential?: string;
  readonly description: string;
  create(): Probe;
}

// ============================================================
// Outcome / ScanResult
// ============================================================

export interface ProbeSuccess {
  status: 'success';
  priority: Priority;
  durationMs: number;
  data: ProbePayload;
}

export interface ProbeSkipped {
  status: 'skipped';
  priority: Priority;
  durationMs: number;
  reason: string;
}

export interface ProbeError {
  status: 'error';
  priority: Priority;
  durationMs: number;
  error: string;
}

/** Probe 1 回の実行の終端結果。生成後は不変。 */
export type ProbeOutcome = ProbeSuccess | ProbeSkipped | ProbeError;

export type ProbeStatus = ProbeOutcome['status'];

/** スキャン全体の結果。probes のキー順は Registry 順。 */
export interface ScanResult {
  target: string;
  /** ISO 8601 (UTC) */
  scanTime: string;
  probes: Readonly<Record<string, ProbeOutcome>>;
}

/** 外部に公開するシリアライズ境界オブジェクト。 */
export interface ScanBoundary {
  target: string;
  scan_time: string;
  probes: Record<string, ProbeOutcome>;
}

export function toBoundaryObject(result: ScanResult): ScanBoundary {
  return {
    target: result.target,
    scan_time: result.scanTime,
    probes: { ...result.probes },
  };
}
