/**
 * mimizuku — Technology Probe
 *
 * トップページのレスポンスヘッダーと HTML からサーバー・フレームワーク・CMS を推定する。
 */

import type { CredentialLookup, Finding, Probe, ProbeContext, ProbePayload } from '../types/probe.js';
import { createFinding } from './base.js';
import { fetchWithDeadline, headerValue, headersToRecord } from './http-client.js';

/** 解析する HTML の最大長 */
const MAX_HTML_LENGTH = 512 * 1024;

export type TechnologyCategory = 'server' | 'framework' | 'cms' | 'cdn' | 'analytics' | 'javascript';

export interface Technology {
  name: string;
  category: TechnologyCategory;
  evidence: string;
  version?: string;
}

interface HtmlSignature {
  name: string;
  category: TechnologyCategory;
  pattern: RegExp;
}

const HTML_SIGNATURES: readonly HtmlSignature[] = [
  { name: 'WordPress', category: 'cms', pattern: /\/wp-(?:content|includes)\//i },
  { name: 'Drupal', category: 'cms', pattern: /\/sites\/(?:default|all)\/(?:files|modules|themes)\//i },
  { name: 'Joomla', category: 'cms', pattern: /\/media\/jui\/|\/components\/com_/i },
  { name: 'Shopify', category: 'cms', pattern: /cdn\.shopify\.com/i },
  { name: 'Next.js', category: 'framework', pattern: /\/_next\/static\/|id="__NEXT_DATA__"/i },
  { name: 'Nuxt', category: 'framework', pattern: /\/_nuxt\/|window\.__NUXT__/i },
  { name: 'Gatsby', category: 'framework', pattern: /id="___gatsby"/i },
  { name: 'React', category: 'javascript', pattern: /data-reactroot|react(?:\.production)?\.min\.js/i },
  { name: 'Vue.js', category: 'javascript', pattern: /data-v-[0-9a-f]{8}|vue(?:\.runtime)?(?:\.min)?\.js/i },
  { name: 'Angular', category: 'javascript', pattern: /ng-version=|ng-app=/i },
  { name: 'jQuery', category: 'javascript', pattern: /jquery(?:-\d[\d.]*)?(?:\.min)?\.js/i },
  { name: 'Google Analytics', category: 'analytics', pattern: /googletagmanager\.com\/gtag|google-analytics\.com/i },
  { name: 'Google Tag Manager', category: 'analytics', pattern: /googletagmanager\.com\/gtm\.js/i },
];

interface HeaderSignature {
  header: string;
  name: string;
  category: TechnologyCategory;
  pattern?: RegExp;
}

const HEADER_SIGNATURES: readonly HeaderSignature[] = [
  { header: 'cf-ray', name: 'Cloudflare', category: 'cdn' },
  { header: 'x-amz-cf-id', name: 'Amazon CloudFront', category: 'cdn' },
  { header: 'x-served-by', name: 'Fastly', category: 'cdn', pattern: /cache-/i },
  { header: 'x-akamai-transformed', name: 'Akamai', category: 'cdn' },
  { header: 'x-vercel-id', name: 'Vercel', category: 'cdn' },
  { header: 'x-drupal-cache', name: 'Drupal', category: 'cms' },
  { header: 'x-shopify-stage', name: 'Shopify', category: 'cms' },
  { header: 'x-aspnet-version', name: 'ASP.NET', category: 'framework' },
];

/** "nginx/1.25.3" → { name: 'nginx', version: '1.25.3' } */
function splitProduct(value: string): { name: string; version?: string } {
  const match = /^([^/\s]+)(?:\/([\w.-]+))?/.exec(value.trim());
  const name = match?.[1] ?? value.trim();
  const version = match?.[2];
  return version !== undefined ? { name, version } : { name };
}

/** ヘッダーと HTML から技術スタックを推定する。同名の重複は最初の証拠を残す。 */
export function detectTechnologies(headers: Readonly<Record<string, string>>, html: string): Technology[] {
  const found = new Map<string, Technology>();
  const add = (tech: Technology): void => {
    if (!found.has(tech.name)) found.set(tech.name, tech);
  };

  const server = headerValue(headers, 'server');
  if (server) {
    add({ ...splitProduct(server), category: 'server', evidence: `Server: ${server}` });
  }
  const poweredBy = headerValue(headers, 'x-powered-by');
  if (poweredBy) {
    add({ ...splitProduct(poweredBy), category: 'framework', evidence: `X-Powered-By: ${poweredBy}` });
  }
  for (const signature of HEADER_SIGNATURES) {
    const value = headerValue(headers, signature.header);
    if (value !== undefined && (signature.pattern === undefined || signature.pattern.test(value))) {
      add({ name: signature.name, category: signature.category, evidence: `${signature.header} header` });
    }
  }

  const generator = /<meta[^>]+name=["']generator["'][^>]*content=["']([^"']+)["']/i.exec(html)?.[1];
  if (generator) {
    const [name = generator, ...rest] = generator.trim().split(/\s+/);
    const version = rest.find((part) => /^\d/.test(part));
    add({ name, category: 'cms', evidence: `meta generator: ${generator}`, ...(version ? { version } : {}) });
  }
  for (const signature of HTML_SIGNATURES) {
    if (signature.pattern.test(html)) {
      add({ name: signature.name, category: signature.category, evidence: 'HTML markup' });
    }
  }

  return [...found.values()];
}

export function analyzeTechnologies(technologies: readonly Technology[]): Finding[] {
  if (technologies.length === 0) {
    return [createFinding('info', 'No technologies identified', 'No known technology fingerprints matched')];
  }

  const findings = [
    createFinding(
      'info',
      `${technologies.length} technologies identified`,
      `Detected: ${technologies.map((t) => (t.version ? `${t.name} ${t.version}` : t.name)).join(', ')}`,
      { data: technologies },
    ),
  ];

  const versioned = technologies.filter((t) => t.version !== undefined);
  if (versioned.length > 0) {
    findings.push(
      createFinding(
        'low',
        'Software versions disclosed',
        `Version numbers are publicly visible: ${versioned.map((t) => `${t.name} ${t.version ?? ''}`).join(', ')}`,
        { recommendation: 'Hide version numbers in headers and generator tags' },
      ),
    );
  }
  return findings;
}

export interface TechnologyPayload extends ProbePayload {
  url?: string;
  technologies: Technology[];
  error?: string;
}

export class TechnologyProbe implements Probe {
  async scan(
    target: string,
    _credentials: CredentialLookup,
    { signal, logger }: ProbeContext,
  ): Promise<TechnologyPayload> {
    for (const url of [`https://${target}`, `http://${target}`]) {
      try {
        const response = await fetchWithDeadline(url, signal);
        const html = (await response.text()).slice(0, MAX_HTML_LENGTH);
        const technologies = detectTechnologies(headersToRecord(response.headers), html);
        return { url: response.url, technologies, findings: analyzeTechnologies(technologies) };
      } catch (err) {
        signal.throwIfAborted();
        logger.debug({ err }, `Technology fingerprinting failed for ${url}`);
      }
    }
    return { technologies: [], error: `Unable to fetch ${target} homepage`, findings: [] };
  }
}
