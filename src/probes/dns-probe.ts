/**
 * mimizuku — DNS Probe
 *
 * 主要レコード種別を問い合わせ、SPF / DMARC / MX / CAA の設定を評価する。
 * A レコードで NXDOMAIN なら critical Finding を出して以降の問い合わせを打ち切る。
 * それ以外の種別と _dmarc は並列に問い合わせる。
 */

import type { Resolver } from 'node:dns/promises';
import type { Logger } from '../logger.js';
import type { CredentialLookup, Finding, Probe, ProbeContext, ProbePayload } from '../types/probe.js';
import { createFinding, withDeadline } from './base.js';
import { dnsErrorCode, isNoRecordError, withResolver } from './resolver.js';

export const RECORD_TYPES = ['A', 'AAAA', 'MX', 'NS', 'TXT', 'SOA', 'CNAME', 'SRV', 'CAA'] as const;
export type RecordType = (typeof RECORD_TYPES)[number];

/**
 * レコード種別ごとの問い合わせ上限（ms）。
 * A を先に引き、残りは並列に引くので全体は概ねこの 2 倍で収まる。
 */
export const RECORD_DEADLINE_MS = 5000;

export interface DmarcResult {
  present: boolean;
  record?: string;
  policy?: string;
}

export interface DnsPayload extends ProbePayload {
  records: Partial<Record<RecordType, string[]>>;
  nameservers: string[];
  dmarc?: DmarcResult;
  dnssec: 'not_checked';
}

// ============================================================
// 問い合わせ
// ============================================================

async function queryRecords(resolver: Resolver, target: string, type: RecordType): Promise<string[]> {
  switch (type) {
    case 'A':
      return resolver.resolve4(target);
    case 'AAAA':
      return resolver.resolve6(target);
    case 'MX':
      return (await resolver.resolveMx(target)).map((mx) => `${mx.priority} ${mx.exchange}`);
    case 'NS':
      return resolver.resolveNs(target);
    case 'TXT':
      return (await resolver.resolveTxt(target)).map((chunks) => chunks.join(''));
    case 'SOA': {
      const soa = await resolver.resolveSoa(target);
      return [
        `${soa.nsname} ${soa.hostmaster} ${soa.serial} ${soa.refresh} ${soa.retry} ${soa.expire} ${soa.minttl}`,
      ];
    }
    case 'CNAME':
      return resolver.resolveCname(target);
    case 'SRV':
      return (await resolver.resolveSrv(target)).map(
        (srv) => `${srv.priority} ${srv.weight} ${srv.port} ${srv.name}`,
      );
    case 'CAA':
      return (await resolver.resolveCaa(target)).map((caa) => {
        const [tag, value] =
          Object.entries(caa).find(([key]) => key !== 'critical') ?? ['unknown', ''];
        return `${caa.critical} ${tag} "${String(value)}"`;
      });
    default: {
      const _exhaustive: never = type;
      throw new Error(`Unknown record type: ${String(_exhaustive)}`);
    }
  }
}

// ============================================================
// 分析（純粋関数）
// ============================================================

/** レコード種別ごとのセキュリティ観点の Finding を返す。 */
export function analyzeRecords(type: RecordType, records: readonly string[]): Finding[] {
  const findings: Finding[] = [];

  switch (type) {
    case 'TXT':
      for (const record of records) {
        if (!record.startsWith('v=spf1')) continue;
        if (record.includes('~all') || record.includes('-all')) {
          findings.push(createFinding('info', 'SPF record configured', `Domain has SPF configured: ${record}`));
        } else {
          findings.push(
            createFinding('medium', 'Weak SPF policy', `SPF record exists but may be too permissive: ${record}`, {
              recommendation: "Consider using '-all' for stricter SPF policy",
            }),
          );
        }
      }
      if (!records.some((record) => record.startsWith('v=spf1'))) {
        findings.push(
          createFinding('medium', 'No SPF record', 'Domain does not publish an SPF policy', {
            recommendation: 'Publish an SPF record listing the servers allowed to send mail for this domain',
          }),
        );
      }
      break;
    case 'MX':
      if (records.length === 0) {
        findings.push(createFinding('low', 'No MX records', 'Domain has no MX records - may not accept email'));
      }
      break;
    case 'CAA':
      if (records.length > 0) {
        findings.push(
          createFinding('info', 'CAA records present', 'Domain has Certificate Authority Authorization records', {
            data: records,
          }),
        );
      } else {
        findings.push(
          createFinding('low', 'No CAA records', 'Domain lacks CAA records to restrict certificate issuance', {
            recommendation: 'Consider adding CAA records to prevent unauthorized certificate issuance',
          }),
        );
      }
      break;
    default:
      break;
  }

  return findings;
}

/** _dmarc TXT レコードから DMARC 設定を読み取る。 */
export function parseDmarc(records: readonly string[]): DmarcResult {
  const record = records.find((r) => r.trim().toUpperCase().startsWith('V=DMARC1'));
  if (record === undefined) {
    return { present: false };
  }
  const policy = /(?:^|;)\s*p\s*=\s*([a-z]+)/i.exec(record)?.[1]?.toLowerCase();
  return { present: true, record, ...(policy !== undefined ? { policy } : {}) };
}

export function analyzeDmarc(target: string, dmarc: DmarcResult): Finding[] {
  if (!dmarc.present) {
    return [
      createFinding('medium', 'No DMARC record', `No DMARC policy published at _dmarc.${target}`, {
        recommendation: 'Publish a DMARC record (start with p=none and move to p=quarantine or p=reject)',
      }),
    ];
  }
  const findings = [
    createFinding('info', 'DMARC record found', `Domain has DMARC configured: ${dmarc.record ?? ''}`),
  ];
  if (dmarc.policy === 'none' || dmarc.policy === undefined) {
    findings.push(
      createFinding('low', 'DMARC policy not enforcing', 'DMARC policy is p=none; spoofed mail is still delivered', {
        recommendation: 'Upgrade the DMARC policy to p=quarantine or p=reject',
      }),
    );
  }
  return findings;
}

// ============================================================
// Probe
// ============================================================

type QueryResult = { type: RecordType; records: string[] } | { type: RecordType; error: unknown };

async function queryWithDeadline(
  resolver: Resolver,
  target: string,
  type: RecordType,
  signal: AbortSignal,
): Promise<QueryResult> {
  try {
    const records = await withDeadline(
      queryRecords(resolver, target, type),
      RECORD_DEADLINE_MS,
      `${type} query`,
      signal,
    );
    return { type, records };
  } catch (err) {
    signal.throwIfAborted();
    return { type, error: err };
  }
}

async function queryDmarc(
  resolver: Resolver,
  target: string,
  signal: AbortSignal,
  logger: Logger,
): Promise<DmarcResult> {
  try {
    const txt = await withDeadline(
      resolver.resolveTxt(`_dmarc.${target}`),
      RECORD_DEADLINE_MS,
      'DMARC query',
      signal,
    );
    return parseDmarc(txt.map((chunks) => chunks.join('')));
  } catch (err) {
    signal.throwIfAborted();
    if (!isNoRecordError(err)) {
      logger.debug({ err }, '  ✗ Error querying DMARC record');
    }
    return { present: false };
  }
}

/** 問い合わせ結果を payload に反映する。NXDOMAIN なら false を返す。 */
function applyResult(payload: DnsPayload, target: string, result: QueryResult, logger: Logger): boolean {
  const { type } = result;
  if ('records' in result) {
    payload.records[type] = result.records;
    if (result.records.length > 0) {
      logger.debug(`  ✓ Found ${result.records.length} ${type} record(s)`);
    }
    payload.findings.push(...analyzeRecords(type, result.records));
    return true;
  }

  const code = dnsErrorCode(result.error);
  if (code === 'ENOTFOUND') {
    logger.warn('  ✗ Domain does not exist (NXDOMAIN)');
    payload.findings.push(
      createFinding('critical', 'Domain does not exist', `The domain ${target} does not exist (NXDOMAIN)`, {
        recommendation: 'Verify the target domain name',
      }),
    );
    return false;
  }
  payload.records[type] = [];
  if (code === 'ENODATA') {
    payload.findings.push(...analyzeRecords(type, []));
  } else {
    logger.debug({ err: result.error }, `  ✗ Error querying ${type} records`);
  }
  return true;
}

export class DnsProbe implements Probe {
  async scan(
    target: string,
    _credentials: CredentialLookup,
    { signal, logger }: ProbeContext,
  ): Promise<DnsPayload> {
    logger.info(`  → Querying DNS records for ${target}`);
    const payload: DnsPayload = { records: {}, nameservers: [], findings: [], dnssec: 'not_checked' };

    await withResolver(signal, async (resolver) => {
      // A で NXDOMAIN を判定してから残りを並列に引く
      const [first, ...rest] = RECORD_TYPES;
      if (!applyResult(payload, target, await queryWithDeadline(resolver, target, first, signal), logger)) {
        return;
      }

      const [results, dmarc] = await Promise.all([
        Promise.all(rest.map((type) => queryWithDeadline(resolver, target, type, signal))),
        queryDmarc(resolver, target, signal, logger),
      ]);
      for (const result of results) {
        if (!applyResult(payload, target, result, logger)) {
          return;
        }
      }
      payload.dmarc = dmarc;
      payload.findings.push(...analyzeDmarc(target, dmarc));
    });

    payload.nameservers = payload.records.NS ?? [];
    logger.info('  ✓ DNS probe completed');
    return payload;
  }
}
