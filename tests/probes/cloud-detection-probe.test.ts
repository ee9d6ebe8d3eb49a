import { describe, it, expect } from 'vitest';
import { analyzeCloud, detectProvider } from '../../src/probes/cloud-detection-probe.js';

describe('detectProvider', () => {
  it('逆引き名や CNAME のキーワードで事業者を特定する', () => {
    expect(detectProvider(['ec2-192-0-2-1.compute-1.AMAZONAWS.com'])).toBe('aws');
    expect(detectProvider(['example.com.cdn.cloudflare.net'])).toBe('cloudflare');
    expect(detectProvider(['e1234.a.akamaiedge.net'])).toBe('akamai');
  });

  it('一致しなければ undefined', () => {
    expect(detectProvider(['host.example.net'])).toBeUndefined();
    expect(detectProvider([])).toBeUndefined();
  });
});

describe('analyzeCloud', () => {
  it('事業者ありなら Hosted on', () => {
    expect(analyzeCloud('gcp', '192.0.2.1')).toEqual([
      {
        severity: 'info',
        title: 'Hosted on gcp',
        description: 'Target infrastructure appears to be served by gcp',
        data: { provider: 'gcp', ip: '192.0.2.1' },
      },
    ]);
  });

  it('事業者なし', () => {
    expect(analyzeCloud(undefined, '192.0.2.1')[0]?.description).toBe(
      'No known cloud or CDN provider matched 192.0.2.1',
    );
  });
});
