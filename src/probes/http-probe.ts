/**
 * mimizuku — HTTP Probe
 *
 * http:// と https:// の両方にアクセスし、情報漏えいヘッダー・HTTPS リダイレクト・
 * robots.txt・sitemap を確認する。sitemap は fast-xml-parser で URL 数を数える。
 */

import { XMLParser } from 'fast-xml-parser';
import type { CredentialLookup, Finding, Probe, ProbeContext, ProbePayload } from '../types/probe.js';
import { createFinding } from './base.js';
import { fetchWithDeadline, headerValue, headersToRecord } from './http-client.js';

const AUX_TIMEOUT_MS = 5000;
const ROBOTS_PREVIEW_LENGTH = 1000;
const MAX_DISALLOWED_PATHS = 10;
const SITEMAP_PATHS = ['/sitemap.xml', '/sitemap_index.xml'] as const;

export type Scheme = 'http' | 'https';

export interface UrlProbeResult {
  accessible: boolean;
  statusCode?: number;
  headers: Record<string, string>;
  server?: string;
  poweredBy?: string;
  contentType?: string;
  finalUrl?: string;
  error?: string;
}

export interface RobotsResult {
  exists: boolean;
  url?: string;
  content?: string;
  disallowed: string[];
}

export interface SitemapResult {
  exists: boolean;
  url?: string;
  kind?: 'urlset' | 'sitemapindex';
  urlCount?: number;
}

export interface HttpPayload extends ProbePayload {
  http: UrlProbeResult;
  https: UrlProbeResult;
  robotsTxt: RobotsResult;
  sitemap: SitemapResult;
}

// ============================================================
// 分析（純粋関数）
// ============================================================

export function analyzeHttpResponse(scheme: Scheme, target: string, result: UrlProbeResult): Finding[] {
  const findings: Finding[] = [];
  if (!result.accessible) return findings;

  if (result.server) {
    findings.push(
      createFinding('low', 'Server header exposed', `Server header reveals: ${result.server}`, {
        recommendation: 'Consider hiding or obfuscating server information',
      }),
    );
  }
  if (result.poweredBy) {
    findings.push(
      createFinding('low', 'X-Powered-By header exposed', `Technology stack revealed: ${result.poweredBy}`, {
        recommendation: 'Remove X-Powered-By header',
      }),
    );
  }
  if (scheme === 'http') {
    findings.push(
      createFinding('info', 'HTTP service available', `Site is accessible via HTTP on ${scheme}://${target}`),
    );
  }
  return findings;
}

/** 両方アクセス可能な場合のみ HTTP→HTTPS リダイレクトを評価する。 */
export function analyzeRedirect(http: UrlProbeResult, https: UrlProbeResult): Finding[] {
  if (!http.accessible || !https.accessible) return [];
  if (http.finalUrl?.startsWith('https') === true) {
    return [createFinding('info', 'HTTP redirects to HTTPS', 'HTTP traffic is properly redirected to HTTPS')];
  }
  return [
    createFinding('high', 'No HTTP to HTTPS redirect', 'HTTP site does not redirect to HTTPS', {
      recommendation: 'Implement HTTP to HTTPS redirect',
    }),
  ];
}

/** robots.txt の Disallow パスを取り出す（空の Disallow は除外）。 */
export function parseRobotsTxt(content: string): string[] {
  const paths: string[] = [];
  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    const match = /^disallow:\s*(.*)$/i.exec(line);
    const path = match?.[1]?.replace(/#.*$/, '').trim();
    if (path) {
      paths.push(path);
    }
  }
  return paths;
}

export function analyzeRobots(robots: RobotsResult): Finding[] {
  if (!robots.exists || robots.disallowed.length === 0) return [];
  return [
    createFinding(
      'info',
      'robots.txt disallowed paths',
      `Found ${robots.disallowed.length} disallowed paths in robots.txt`,
      { data: robots.disallowed.slice(0, MAX_DISALLOWED_PATHS) },
    ),
  ];
}

const sitemapParser = new XMLParser({
  ignoreAttributes: true,
  trimValues: true,
  isArray: (name) => name === 'url' || name === 'sitemap',
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function countEntries(node: unknown, key: string): number {
  if (!isRecord(node)) return 0;
  const entries = node[key];
  return Array.isArray(entries) ? entries.length : 0;
}

/** sitemap XML の種別と URL 数。sitemap として解釈できなければ undefined。 */
export function parseSitemap(xml: string): Pick<SitemapResult, 'kind' | 'urlCount'> | undefined {
  let parsed: unknown;
  try {
    parsed = sitemapParser.parse(xml);
  } catch {
    return undefined;
  }
  if (!isRecord(parsed)) return undefined;
  if ('urlset' in parsed) {
    return { kind: 'urlset', urlCount: countEntries(parsed['urlset'], 'url') };
  }
  if ('sitemapindex' in parsed) {
    return { kind: 'sitemapindex', urlCount: countEntries(parsed['sitemapindex'], 'sitemap') };
  }
  return undefined;
}

export function analyzeSitemap(sitemap: SitemapResult): Finding[] {
  if (!sitemap.exists || sitemap.url === undefined) return [];
  const count = sitemap.urlCount !== undefined ? ` with ${sitemap.urlCount} entries` : '';
  return [createFinding('info', 'Sitemap found', `Sitemap available at ${sitemap.url}${count}`)];
}

// ============================================================
// ネットワーク
// ============================================================

async function probeUrl(url: string, signal: AbortSignal): Promise<UrlProbeResult> {
  try {
    const response = await fetchWithDeadline(url, signal);
    await response.body?.cancel();
    const headers = headersToRecord(response.headers);
    return {
      accessible: true,
      statusCode: response.status,
      headers,
      server: headerValue(headers, 'server'),
      poweredBy: headerValue(headers, 'x-powered-by'),
      contentType: headerValue(headers, 'content-type'),
      finalUrl: response.url,
    };
  } catch (err) {
    signal.throwIfAborted();
    return { accessible: false, headers: {}, error: err instanceof Error ? err.message : String(err) };
  }
}

async function fetchText(url: string, signal: AbortSignal): Promise<string | undefined> {
  try {
    const response = await fetchWithDeadline(url, signal, { timeoutMs: AUX_TIMEOUT_MS });
    if (response.status !== 200) {
      await response.body?.cancel();
      return undefined;
    }
    return await response.text();
  } catch {
    signal.throwIfAborted();
    return undefined;
  }
}

async function checkRobotsTxt(target: string, signal: AbortSignal): Promise<RobotsResult> {
  for (const scheme of ['https', 'http'] as const) {
    const url = `${scheme}://${target}/robots.txt`;
    const content = await fetchText(url, signal);
    if (content !== undefined) {
      return {
        exists: true,
        url,
        content: content.slice(0, ROBOTS_PREVIEW_LENGTH),
        disallowed: parseRobotsTxt(content),
      };
    }
  }
  return { exists: false, disallowed: [] };
}

async function checkSitemap(target: string, signal: AbortSignal): Promise<SitemapResult> {
  for (const scheme of ['https', 'http'] as const) {
    for (const path of SITEMAP_PATHS) {
      const url = `${scheme}://${target}${path}`;
      const xml = await fetchText(url, signal);
      if (xml !== undefined) {
        return { exists: true, url, ...parseSitemap(xml) };
      }
    }
  }
  return { exists: false };
}

export class HttpProbe implements Probe {
  async scan(target: string, _credentials: CredentialLookup, { signal, logger }: ProbeContext): Promise<HttpPayload> {
    logger.info(`  → Probing HTTP/HTTPS endpoints for ${target}`);

    const [http, https] = await Promise.all([
      probeUrl(`http://${target}`, signal),
      probeUrl(`https://${target}`, signal),
    ]);

    const findings: Finding[] = [
      ...analyzeHttpResponse('http', target, http),
      ...analyzeHttpResponse('https', target, https),
      ...analyzeRedirect(http, https),
    ];

    const robotsTxt = await checkRobotsTxt(target, signal);
    findings.push(...analyzeRobots(robotsTxt));

    const sitemap = await checkSitemap(target, signal);
    findings.push(...analyzeSitemap(sitemap));

    logger.info('  ✓ HTTP probe completed');
    return { http, https, robotsTxt, sitemap, findings };
  }
}
