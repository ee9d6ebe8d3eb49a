import { describe, it, expect } from 'vitest';
import { escapeHtml, renderHtmlReport } from '../../src/report/html-report.js';
import { sampleReport, sampleResult } from '../helpers/scan-fixture.js';

const GENERATED = new Date('2024-05-01T12:05:00.000Z');

describe('escapeHtml', () => {
  it('HTML の特殊文字をエスケープする', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;',
    );
  });
});

describe('renderHtmlReport', () => {
  const result = sampleResult('example.com');
  const html = renderHtmlReport(result, sampleReport(result), GENERATED);

  it('単一ファイルの HTML 文書', () => {
    expect(html.startsWith('<!DOCTYPE html>')).toBe(true);
    expect(html).toContain('<title>OSINT Report - example.com</title>');
    expect(html).not.toContain('<link');
    expect(html).not.toContain('<script');
  });

  it('Finding の文字列はエスケープされる', () => {
    expect(html).toContain('<p>Server header reveals: &lt;nginx&gt;</p>');
  });

  it('件数カードと Probe 状況', () => {
    expect(html).toContain('<div class="count">3</div><div>TOTAL</div>');
    expect(html).toContain('<tr><td>ports</td><td>error</td><td>Could not resolve hostname</td></tr>');
  });

  it('技術スタック表を含む', () => {
    expect(html).toContain('<h2>Technology Stack</h2>');
    expect(html).toContain('Cloudflare');
  });

  it('生データは Probe ごとの details', () => {
    expect(html).toContain('<summary>shodan (skipped)</summary>');
  });
});
