/**
 * mimizuku — Scan service
 *
 * Coordinator → Aggregator → 履歴保存 の一連の流れ。CLI と MCP サーバーで共用する。
 */

import type { Logger } from 'pino';
import type { ScanRepository } from '../db/repository/scan-repository.js';
import type { StoredScan } from '../types/entities.js';
import type { CredentialLookup, ProbeDescriptor, ProbeOutcome, ScanResult } from '../types/probe.js';
import type { AggregatedReport } from '../types/report.js';
import { aggregateFindings } from './aggregator.js';
import { ScanCoordinator } from './coordinator.js';
import type { TimeoutPolicy } from './coordinator.js';

export interface ScanServiceOptions {
  registry: readonly ProbeDescriptor[];
  credentials: CredentialLookup;
  logger: Logger;
  timeouts?: TimeoutPolicy;
  /** 指定時のみ履歴を保存する */
  repository?: ScanRepository;
}

export interface ScanRequest {
  target: string;
  selection?: readonly string[];
  signal?: AbortSignal;
  onOutcome?: (name: string, outcome: ProbeOutcome) => void;
}

export interface CompletedScan {
  result: ScanResult;
  report: AggregatedReport;
  stored?: StoredScan;
}

/** ScanInterruptedError で中断されたかどうかは signal で判定する（呼び出し側の責務）。 */
export async function executeScan(options: ScanServiceOptions, request: ScanRequest): Promise<CompletedScan> {
  const coordinator = new ScanCoordinator(options.registry, {
    credentials: options.credentials,
    logger: options.logger,
    selection: request.selection,
    timeouts: options.timeouts,
  });

  const result = await coordinator.run(request.target, {
    signal: request.signal,
    onOutcome: request.onOutcome,
  });
  const report = aggregateFindings(result);

  if (options.repository === undefined || request.signal?.aborted === true) {
    return { result, report };
  }
  const stored = options.repository.save(result, report, new Date().toISOString());
  options.logger.debug({ scanId: stored.id }, 'Scan stored in history');
  return { result, report, stored };
}
