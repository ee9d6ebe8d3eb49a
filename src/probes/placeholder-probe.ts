/**
 * mimizuku — Placeholder Probe
 *
 * 外部データソースとの連携が未実装の Probe。ネットワークに触れず、
 * 未実装である旨の info Finding だけを返す。
 */

import type { CredentialLookup, Probe, ProbeContext, ProbePayload } from '../types/probe.js';
import { createFinding } from './base.js';

export interface PlaceholderPayload extends ProbePayload {
  implemented: false;
}

export class PlaceholderProbe implements Probe {
  constructor(
    private readonly title: string,
    private readonly description: string,
  ) {}

  async scan(_target: string, _credentials: CredentialLookup, _context: ProbeContext): Promise<PlaceholderPayload> {
    return {
      implemented: false,
      findings: [createFinding('info', this.title, this.description)],
    };
  }
}
