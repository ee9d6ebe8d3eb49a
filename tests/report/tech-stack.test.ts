import { describe, it, expect } from 'vitest';
import { analyzeTechStack, successPayload } from '../../src/report/tech-stack.js';
import type { ScanResult } from '../../src/types/probe.js';
import { sampleResult } from '../helpers/scan-fixture.js';

describe('successPayload', () => {
  it('成功した Probe の payload だけを返す', () => {
    const result = sampleResult();
    expect(successPayload(result, 'dns')?.findings).toHaveLength(1);
    expect(successPayload(result, 'ports')).toBeUndefined();
    expect(successPayload(result, 'missing')).toBeUndefined();
  });
});

describe('analyzeTechStack', () => {
  it('HTTP ヘッダーと DNS から推定する', () => {
    const stack = analyzeTechStack(sampleResult());

    expect(stack.web_server.detected).toEqual(['nginx/1.25.3']);
    expect(stack.backend.detected).toEqual(['Express']);
    expect(stack.cdn.detected).toEqual(['Cloudflare']);
    expect(stack.hosting).toEqual({
      detected: ['Nameservers: ns1.example.net'],
      evidence: ['A records point to: 192.0.2.10', 'DNS managed by: ns1.example.net'],
    });
    expect(stack.email.detected).toEqual(['10 aspmx.l.google.com', 'Google Workspace / Gmail']);
    expect(stack.database.detected).toEqual([]);
  });

  it('SSL・ポート・技術・クラウドの寄与', () => {
    const result: ScanResult = {
      target: 'example.com',
      scanTime: '2024-05-01T12:00:00.000Z',
      probes: {
        ssl: {
          status: 'success',
          priority: 'high',
          durationMs: 1,
          data: { protocol: 'TLSv1.3', certificate: { issuer: { CN: 'Test CA R1' } }, findings: [] },
        },
        ports: {
          status: 'success',
          priority: 'critical',
          durationMs: 1,
          data: { openPorts: [{ port: 443 }, { port: 5432 }, 'garbage'], findings: [] },
        },
        technology: {
          status: 'success',
          priority: 'medium',
          durationMs: 1,
          data: {
            technologies: [
              { name: 'React', category: 'javascript', evidence: 'HTML markup' },
              { name: 'Cloudflare', category: 'cdn', evidence: 'cf-ray header' },
            ],
            findings: [],
          },
        },
        cloud_detection: { status: 'success', priority: 'medium', durationMs: 1, data: { provider: 'aws', findings: [] } },
      },
    };

    const stack = analyzeTechStack(result);

    expect(stack.ssl_tls.detected).toEqual(['TLS Version: TLSv1.3', 'Certificate Issuer: Test CA R1']);
    expect(stack.database.detected).toEqual(['PostgreSQL']);
    expect(stack.frontend.detected).toEqual(['React']);
    expect(stack.cdn.detected).toEqual(['Cloudflare']);
    expect(stack.hosting.detected).toEqual(['aws']);
  });

  it('失敗した Probe は無視する', () => {
    const stack = analyzeTechStack({
      target: 'example.com',
      scanTime: '2024-05-01T12:00:00.000Z',
      probes: { http: { status: 'error', priority: 'high', durationMs: 1, error: 'boom' } },
    });
    expect(stack.web_server).toEqual({ detected: [], evidence: [] });
  });
});
