import { describe, it, expect } from 'vitest';
import { aggregateFindings, flattenFindings, normalizeSeverity } from '../../src/engine/aggregator.js';
import type { Finding, ProbeOutcome, ScanResult } from '../../src/types/probe.js';
import { finding } from '../helpers/stub-probes.js';

function success(...findings: Finding[]): ProbeOutcome {
  return { status: 'success', priority: 'high', durationMs: 5, data: { findings } };
}

function scanResult(probes: Record<string, ProbeOutcome>): ScanResult {
  return { target: 'example.com', scanTime: '2024-05-01T12:00:00.000Z', probes };
}

describe('normalizeSeverity', () => {
  it('既知の重大度はそのまま、それ以外は info', () => {
    expect(normalizeSeverity('critical')).toBe('critical');
    expect(normalizeSeverity('CRITICAL')).toBe('info');
    expect(normalizeSeverity(undefined)).toBe('info');
    expect(normalizeSeverity(3)).toBe('info');
  });
});

describe('aggregateFindings', () => {
  it('Finding を重大度別に振り分け、発生元 Probe を付与する', () => {
    const report = aggregateFindings(
      scanResult({
        a: success(finding('high', 'H1'), finding('info', 'I1')),
        b: { status: 'skipped', priority: 'medium', durationMs: 1, reason: 'Missing capability: shodan credential is not configured' },
        c: { status: 'error', priority: 'low', durationMs: 2, error: 'boom' },
        d: success(finding('high', 'H2')),
      }),
    );

    expect(report.findings.high.map((f) => [f.probe, f.title])).toEqual([
      ['a', 'H1'],
      ['d', 'H2'],
    ]);
    expect(report.findings.info.map((f) => f.title)).toEqual(['I1']);
    expect(report.summary).toEqual({ critical: 0, high: 2, medium: 0, low: 0, info: 1, total: 3 });
    expect(report.probeStatus).toEqual({
      successful: [{ name: 'a' }, { name: 'd' }],
      failed: [{ name: 'c', error: 'boom' }],
      skipped: [{ name: 'b', reason: 'Missing capability: shodan credential is not configured' }],
    });
  });

  it('不明な重大度の Finding は info に入る', () => {
    const odd = JSON.parse('{"severity": "urgent", "title": "Odd", "description": "odd"}');
    const report = aggregateFindings(scanResult({ a: success(odd) }));

    expect(report.findings.info).toEqual([{ severity: 'info', title: 'Odd', description: 'odd', probe: 'a' }]);
    expect(report.summary.total).toBe(1);
  });

  it('元の payload は変更しない', () => {
    const original = finding('low', 'L1');
    const result = scanResult({ a: success(original) });

    aggregateFindings(result);

    expect(original).toEqual({ severity: 'low', title: 'L1', description: 'L1 description' });
    expect('probe' in original).toBe(false);
  });

  it('同じ入力には同じ出力を返す', () => {
    const result = scanResult({ a: success(finding('medium', 'M1')), b: success(finding('medium', 'M2')) });
    expect(aggregateFindings(result)).toEqual(aggregateFindings(result));
  });

  it('Probe が 1 つもなければ全て 0', () => {
    const report = aggregateFindings(scanResult({}));
    expect(report.summary).toEqual({ critical: 0, high: 0, medium: 0, low: 0, info: 0, total: 0 });
    expect(report.probeStatus).toEqual({ successful: [], failed: [], skipped: [] });
  });
});

describe('flattenFindings', () => {
  it('重大度の高い順に並べる', () => {
    const report = aggregateFindings(
      scanResult({
        a: success(finding('low', 'L1'), finding('critical', 'C1')),
        b: success(finding('info', 'I1'), finding('critical', 'C2')),
      }),
    );

    expect(flattenFindings(report).map((f) => f.title)).toEqual(['C1', 'C2', 'L1', 'I1']);
  });
});
