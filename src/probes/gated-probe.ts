/**
 * mimizuku — Credential-gated Probe
 *
 * 外部サービスの認証情報を必須とする Probe。認証情報が無ければ
 * ネットワーク I/O の前に MissingCapabilityError を投げる（Runner が skipped にする）。
 * 認証情報がある場合も第三者 API の呼び出しは行わず、info Finding を返す。
 */

import type { CredentialLookup, Probe, ProbeContext, ProbePayload } from '../types/probe.js';
import { createFinding, requireCredential } from './base.js';

export interface GatedPayload extends ProbePayload {
  service: string;
  configured: true;
}

export class GatedProbe implements Probe {
  constructor(
    private readonly service: string,
    private readonly title: string,
  ) {}

  async scan(target: string, credentials: CredentialLookup, { logger }: ProbeContext): Promise<GatedPayload> {
    requireCredential(credentials, this.service);
    logger.debug(`  → ${this.service} credential available for ${target}`);

    return {
      service: this.service,
      configured: true,
      findings: [
        createFinding(
          'info',
          this.title,
          `${this.service} credential is configured but the integration is not implemented`,
        ),
      ],
    };
  }
}
