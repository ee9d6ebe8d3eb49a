import { describe, it, expect } from 'vitest';
import { renderMarkdownReport } from '../../src/report/markdown-report.js';
import { sampleReport, sampleResult } from '../helpers/scan-fixture.js';

const GENERATED = new Date('2024-05-01T12:05:00.000Z');

describe('renderMarkdownReport', () => {
  const result = sampleResult();
  const lines = renderMarkdownReport(result, sampleReport(result), GENERATED).split('\n');

  it('見出しと対象情報', () => {
    expect(lines.slice(0, 6)).toEqual([
      '# OSINT Reconnaissance Report',
      '',
      '## Target Information',
      '- **Target:** example.com',
      '- **Scan Time:** 2024-05-01T12:00:00.000Z',
      '- **Generated:** 2024-05-01T12:05:00.000Z',
    ]);
  });

  it('重大度別の件数表', () => {
    const start = lines.indexOf('| Severity | Count |');
    expect(lines.slice(start, start + 8)).toEqual([
      '| Severity | Count |',
      '|----------|-------|',
      '| Critical | 0 |',
      '| High | 1 |',
      '| Medium | 1 |',
      '| Low | 1 |',
      '| Info | 0 |',
      '| **Total** | **3** |',
    ]);
  });

  it('Probe の実行状況', () => {
    expect(lines).toContain('- **Successful (2):** dns, http');
    expect(lines).toContain('- **Failed (1):** ports (Could not resolve hostname)');
    expect(lines).toContain('- **Skipped (1):** shodan (Missing capability: shodan credential is not configured)');
  });

  it('Finding は重大度順のセクションに並び、空のセクションは出さない', () => {
    const sections = lines.filter((line) => line.startsWith('## ') && line.includes('Findings'));
    expect(sections).toEqual(['## High Findings (1)', '## Medium Findings (1)', '## Low Findings (1)']);

    const start = lines.indexOf('### No DMARC record');
    expect(lines.slice(start, start + 10)).toEqual([
      '### No DMARC record',
      '',
      '**Probe:** dns  ',
      '**Severity:** MEDIUM  ',
      '',
      'No DMARC policy published at _dmarc.example.com',
      '',
      '**Recommendation:** Publish a DMARC record',
      '',
      '---',
    ]);
  });

  it('フッター', () => {
    expect(lines.at(-2)).toBe('*Generated by mimizuku v0.1.0*');
  });

  it('Probe が無い場合は none と表示する', () => {
    const empty = { target: 'example.com', scanTime: '2024-05-01T12:00:00.000Z', probes: {} };
    const text = renderMarkdownReport(empty, sampleReport(empty), GENERATED);
    expect(text).toContain('- **Failed (0):** none');
  });
});
