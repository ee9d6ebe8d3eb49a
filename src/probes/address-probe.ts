/**
 * mimizuku — Address Probe
 *
 * ターゲットの IPv4 アドレスを解決して報告する。geolocation / asn で共用。
 * 詳細な位置情報・ASN の照会は行わない。
 */

import type { CredentialLookup, Finding, Probe, ProbeContext, ProbePayload } from '../types/probe.js';
import { createFinding } from './base.js';
import { resolveAddress } from './resolver.js';

export type AddressLookupKind = 'geolocation' | 'asn';

export interface AddressPayload extends ProbePayload {
  ip?: string;
  error?: string;
}

export function describeAddress(kind: AddressLookupKind, ip: string): Finding {
  if (kind === 'geolocation') {
    return createFinding('info', 'Geolocation lookup', `IP address: ${ip}. Detailed geolocation requires API integration`);
  }
  return createFinding('info', 'ASN lookup', `IP address: ${ip}. ASN lookup requires API integration or WHOIS query`);
}

export class AddressProbe implements Probe {
  constructor(private readonly kind: AddressLookupKind) {}

  async scan(target: string, _credentials: CredentialLookup, { signal }: ProbeContext): Promise<AddressPayload> {
    try {
      const ip = await resolveAddress(target, signal);
      return { ip, findings: [describeAddress(this.kind, ip)] };
    } catch (err) {
      signal.throwIfAborted();
      return { error: err instanceof Error ? err.message : String(err), findings: [] };
    }
  }
}
