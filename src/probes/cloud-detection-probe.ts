/**
 * mimizuku — Cloud Detection Probe
 *
 * ターゲットのアドレスを逆引きし、PTR 名と CNAME を既知のクラウド / CDN
 * 事業者のキーワードと照合する。
 */

import type { CredentialLookup, Finding, Probe, ProbeContext, ProbePayload } from '../types/probe.js';
import { createFinding, withDeadline } from './base.js';
import { isNoRecordError, resolveAddress, withResolver } from './resolver.js';

const LOOKUP_DEADLINE_MS = 8000;

/** 事業者 → 逆引き名や CNAME に現れるキーワード（小文字） */
export const CLOUD_PROVIDERS: Readonly<Record<string, readonly string[]>> = {
  aws: ['amazonaws.com', 'cloudfront.net', 'awsglobalaccelerator.com', 'elb.amazonaws.com'],
  azure: ['azure', 'cloudapp.net', 'azurewebsites.net', 'azureedge.net', 'msedge.net'],
  gcp: ['googleusercontent.com', 'bc.googleusercontent.com', 'appspot.com', '1e100.net'],
  cloudflare: ['cloudflare'],
  fastly: ['fastly'],
  akamai: ['akamai', 'akamaiedge.net', 'akamaitechnologies.com', 'edgekey.net', 'edgesuite.net'],
};

export interface CloudPayload extends ProbePayload {
  ip?: string;
  provider?: string;
  hostnames: string[];
  services: string[];
  error?: string;
}

/** 名前の一覧から事業者を特定する。最初に一致したものを返す。 */
export function detectProvider(names: readonly string[]): string | undefined {
  const lowered = names.map((name) => name.toLowerCase());
  for (const [provider, keywords] of Object.entries(CLOUD_PROVIDERS)) {
    if (lowered.some((name) => keywords.some((keyword) => name.includes(keyword)))) {
      return provider;
    }
  }
  return undefined;
}

export function analyzeCloud(provider: string | undefined, ip: string | undefined): Finding[] {
  if (provider === undefined) {
    return [
      createFinding(
        'info',
        'No cloud provider detected',
        `No known cloud or CDN provider matched ${ip ?? 'the target'}`,
      ),
    ];
  }
  return [
    createFinding('info', `Hosted on ${provider}`, `Target infrastructure appears to be served by ${provider}`, {
      data: { provider, ip },
    }),
  ];
}

export class CloudDetectionProbe implements Probe {
  async scan(target: string, _credentials: CredentialLookup, { signal, logger }: ProbeContext): Promise<CloudPayload> {
    const payload: CloudPayload = { hostnames: [], services: [], findings: [] };
    let ip: string;
    try {
      ip = await resolveAddress(target, signal);
      payload.ip = ip;
    } catch (err) {
      signal.throwIfAborted();
      payload.error = err instanceof Error ? err.message : String(err);
      return payload;
    }

    const settled = await withResolver(signal, (resolver) =>
      Promise.allSettled([
        withDeadline(resolver.reverse(ip), LOOKUP_DEADLINE_MS, 'reverse lookup', signal),
        withDeadline(resolver.resolveCname(target), LOOKUP_DEADLINE_MS, 'CNAME lookup', signal),
      ]),
    );
    signal.throwIfAborted();
    for (const result of settled) {
      if (result.status === 'fulfilled') {
        payload.hostnames.push(...result.value);
      } else if (!isNoRecordError(result.reason)) {
        logger.debug({ err: result.reason }, 'Cloud detection lookup failed');
      }
    }

    payload.provider = detectProvider(payload.hostnames);
    if (payload.provider !== undefined) {
      payload.services.push(payload.provider);
    }
    payload.findings.push(...analyzeCloud(payload.provider, ip));
    return payload;
  }
}
