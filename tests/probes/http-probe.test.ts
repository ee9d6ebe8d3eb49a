import { describe, it, expect } from 'vitest';
import {
  analyzeHttpResponse,
  analyzeRedirect,
  analyzeRobots,
  analyzeSitemap,
  parseRobotsTxt,
  parseSitemap,
} from '../../src/probes/http-probe.js';
import type { UrlProbeResult } from '../../src/probes/http-probe.js';

function accessible(overrides: Partial<UrlProbeResult> = {}): UrlProbeResult {
  return { accessible: true, statusCode: 200, headers: {}, ...overrides };
}

describe('analyzeHttpResponse', () => {
  it('Server / X-Powered-By の露出と HTTP の提供', () => {
    const findings = analyzeHttpResponse('http', 'example.com', accessible({ server: 'Apache', poweredBy: 'PHP/8.2' }));
    expect(findings.map((f) => [f.severity, f.title])).toEqual([
      ['low', 'Server header exposed'],
      ['low', 'X-Powered-By header exposed'],
      ['info', 'HTTP service available'],
    ]);
    expect(findings[2]?.description).toBe('Site is accessible via HTTP on http://example.com');
  });

  it('アクセスできなければ何も返さない', () => {
    expect(analyzeHttpResponse('https', 'example.com', { accessible: false, headers: {} })).toEqual([]);
  });
});

describe('analyzeRedirect', () => {
  it('HTTPS へのリダイレクトあり', () => {
    const findings = analyzeRedirect(accessible({ finalUrl: 'https://example.com/' }), accessible());
    expect(findings.map((f) => [f.severity, f.title])).toEqual([['info', 'HTTP redirects to HTTPS']]);
  });

  it('リダイレクトなしは high', () => {
    const findings = analyzeRedirect(accessible({ finalUrl: 'http://example.com/' }), accessible());
    expect(findings.map((f) => [f.severity, f.title])).toEqual([['high', 'No HTTP to HTTPS redirect']]);
  });

  it('片方にしかアクセスできなければ評価しない', () => {
    expect(analyzeRedirect(accessible(), { accessible: false, headers: {} })).toEqual([]);
  });
});

describe('robots.txt', () => {
  it('Disallow パスを取り出す', () => {
    const content = ['User-agent: *', 'Disallow: /admin/  # staff only', 'disallow: /tmp', 'Disallow:', 'Allow: /'].join(
      '\r\n',
    );
    expect(parseRobotsTxt(content)).toEqual(['/admin/', '/tmp']);
  });

  it('最大 10 件を data に載せる', () => {
    const disallowed = Array.from({ length: 12 }, (_, i) => `/p${i}`);
    const findings = analyzeRobots({ exists: true, url: 'https://example.com/robots.txt', disallowed });

    expect(findings).toHaveLength(1);
    expect(findings[0]?.description).toBe('Found 12 disallowed paths in robots.txt');
    expect(findings[0]?.data).toEqual(disallowed.slice(0, 10));
  });

  it('Disallow が無ければ何も返さない', () => {
    expect(analyzeRobots({ exists: true, disallowed: [] })).toEqual([]);
    expect(analyzeRobots({ exists: false, disallowed: [] })).toEqual([]);
  });
});

describe('sitemap', () => {
  it('urlset の URL 数を数える', () => {
    const xml = [
      '<?xml version="1.0" encoding="UTF-8"?>',
      '<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">',
      '<url><loc>https://example.com/</loc></url>',
      '<url><loc>https://example.com/about</loc></url>',
      '</urlset>',
    ].join('\n');
    expect(parseSitemap(xml)).toEqual({ kind: 'urlset', urlCount: 2 });
  });

  it('URL が 1 件でも配列として数える', () => {
    expect(parseSitemap('<urlset><url><loc>https://example.com/</loc></url></urlset>')).toEqual({
      kind: 'urlset',
      urlCount: 1,
    });
  });

  it('sitemapindex', () => {
    const xml = '<sitemapindex><sitemap><loc>https://example.com/a.xml</loc></sitemap></sitemapindex>';
    expect(parseSitemap(xml)).toEqual({ kind: 'sitemapindex', urlCount: 1 });
  });

  it('sitemap でない XML は undefined', () => {
    expect(parseSitemap('<html><body>Not found</body></html>')).toBeUndefined();
  });

  it('Sitemap found の説明', () => {
    expect(analyzeSitemap({ exists: true, url: 'https://example.com/sitemap.xml', kind: 'urlset', urlCount: 2 })).toEqual([
      {
        severity: 'info',
        title: 'Sitemap found',
        description: 'Sitemap available at https://example.com/sitemap.xml with 2 entries',
      },
    ]);
    expect(analyzeSitemap({ exists: true, url: 'https://example.com/sitemap.xml' })[0]?.description).toBe(
      'Sitemap available at https://example.com/sitemap.xml',
    );
    expect(analyzeSitemap({ exists: false })).toEqual([]);
  });
});
