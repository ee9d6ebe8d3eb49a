/**
 * mimizuku — Subdomain Probe
 *
 * よく使われるサブドメイン名 25 個の A レコードを引いて存在を確認する。
 */

import type { CredentialLookup, Finding, Probe, ProbeContext, ProbePayload } from '../types/probe.js';
import { createFinding, withDeadline } from './base.js';
import { isNoRecordError, withResolver } from './resolver.js';

export const COMMON_SUBDOMAINS = [
  'www', 'mail', 'ftp', 'smtp', 'pop', 'ns1', 'ns2', 'admin', 'blog',
  'dev', 'staging', 'test', 'api', 'cdn', 'shop', 'store', 'portal',
  'vpn', 'remote', 'ssh', 'git', 'mysql', 'db', 'webmail', 'forum',
] as const;

/** 公開されていると注意が必要なラベル */
export const SENSITIVE_LABELS: readonly string[] = ['dev', 'staging', 'test', 'admin', 'git', 'db'];

const LOOKUP_DEADLINE_MS = 8000;

export interface DiscoveredSubdomain {
  subdomain: string;
  ips: string[];
}

export interface SubdomainPayload extends ProbePayload {
  subdomains: DiscoveredSubdomain[];
}

export function analyzeSubdomains(target: string, subdomains: readonly DiscoveredSubdomain[]): Finding[] {
  if (subdomains.length === 0) return [];

  const findings = [
    createFinding('info', `${subdomains.length} subdomains discovered`, `Found ${subdomains.length} active subdomains`, {
      data: subdomains,
    }),
  ];

  const suffix = `.${target}`;
  const sensitive = subdomains.filter((s) => {
    const label = s.subdomain.endsWith(suffix) ? s.subdomain.slice(0, -suffix.length) : s.subdomain;
    return SENSITIVE_LABELS.some((keyword) => label.includes(keyword));
  });
  if (sensitive.length > 0) {
    findings.push(
      createFinding(
        'medium',
        'Potentially sensitive subdomains found',
        'Found subdomains that may expose sensitive systems',
        { data: sensitive, recommendation: 'Ensure these subdomains have proper access controls' },
      ),
    );
  }
  return findings;
}

export class SubdomainProbe implements Probe {
  async scan(
    target: string,
    _credentials: CredentialLookup,
    { signal, logger }: ProbeContext,
  ): Promise<SubdomainPayload> {
    logger.info(`  → Checking ${COMMON_SUBDOMAINS.length} common subdomains of ${target}`);
    const results = await withResolver(signal, (resolver) =>
      Promise.all(
        COMMON_SUBDOMAINS.map(async (label): Promise<DiscoveredSubdomain | undefined> => {
          const fqdn = `${label}.${target}`;
          try {
            const ips = await withDeadline(resolver.resolve4(fqdn), LOOKUP_DEADLINE_MS, `${fqdn} lookup`, signal);
            return { subdomain: fqdn, ips };
          } catch (err) {
            signal.throwIfAborted();
            if (!isNoRecordError(err)) {
              logger.debug({ err }, `Error resolving ${fqdn}`);
            }
            return undefined;
          }
        }),
      ),
    );

    const subdomains = results.filter((r): r is DiscoveredSubdomain => r !== undefined);
    return { subdomains, findings: analyzeSubdomains(target, subdomains) };
  }
}
