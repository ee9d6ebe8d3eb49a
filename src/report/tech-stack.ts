/**
 * mimizuku — Technology stack summary
 *
 * 成功した Probe の payload から技術スタックを推定する（HTML レポート用）。
 * payload の形は Probe ごとに異なるため、値は全て実行時に検査して取り出す。
 */

import type { ProbePayload, ScanResult } from '../types/probe.js';

export const TECH_CATEGORIES = [
  'web_server',
  'backend',
  'frontend',
  'cdn',
  'hosting',
  'ssl_tls',
  'email',
  'database',
] as const;
export type TechCategory = (typeof TECH_CATEGORIES)[number];

export interface TechStackEntry {
  detected: string[];
  evidence: string[];
}

export type TechStack = Record<TechCategory, TechStackEntry>;

const DATABASE_PORTS: Readonly<Record<number, string>> = {
  3306: 'MySQL',
  5432: 'PostgreSQL',
  1433: 'MSSQL',
  1521: 'Oracle',
  6379: 'Redis',
  27017: 'MongoDB',
};

const CDN_HEADERS: ReadonlyArray<[string, string]> = [
  ['cf-ray', 'Cloudflare'],
  ['x-amz-cf-id', 'Amazon CloudFront'],
  ['x-akamai-transformed', 'Akamai'],
  ['x-fastly-request-id', 'Fastly'],
];

// ============================================================
// payload からの安全な取り出し
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringsAt(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function stringAt(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/** 成功した Probe の payload。成功していなければ undefined。 */
export function successPayload(result: ScanResult, name: string): ProbePayload | undefined {
  const outcome = result.probes[name];
  return outcome?.status === 'success' ? outcome.data : undefined;
}

function emptyStack(): TechStack {
  const entry = (): TechStackEntry => ({ detected: [], evidence: [] });
  return {
    web_server: entry(),
    backend: entry(),
    frontend: entry(),
    cdn: entry(),
    hosting: entry(),
    ssl_tls: entry(),
    email: entry(),
    database: entry(),
  };
}

function note(stack: TechStack, category: TechCategory, detected: string | undefined, evidence: string): void {
  const entry = stack[category];
  if (detected !== undefined && !entry.detected.includes(detected)) {
    entry.detected.push(detected);
  }
  entry.evidence.push(evidence);
}

// ============================================================
// 各 Probe の寄与
// ============================================================

function fromHttp(stack: TechStack, payload: ProbePayload): void {
  const headers: Record<string, unknown> = {};
  for (const scheme of ['http', 'https']) {
    const response = payload[scheme];
    if (isRecord(response) && isRecord(response['headers'])) {
      Object.assign(headers, response['headers']);
    }
  }

  const server = stringAt(headers['server']);
  if (server !== undefined) note(stack, 'web_server', server, `Server header: ${server}`);
  const poweredBy = stringAt(headers['x-powered-by']);
  if (poweredBy !== undefined) note(stack, 'backend', poweredBy, `X-Powered-By header: ${poweredBy}`);

  for (const [header, cdn] of CDN_HEADERS) {
    if (headers[header] !== undefined) note(stack, 'cdn', cdn, `CDN header detected: ${header}`);
  }
}

function fromSsl(stack: TechStack, payload: ProbePayload): void {
  const protocol = stringAt(payload['protocol']);
  if (protocol !== undefined) note(stack, 'ssl_tls', `TLS Version: ${protocol}`, `TLS protocol: ${protocol}`);

  const certificate = payload['certificate'];
  if (isRecord(certificate) && isRecord(certificate['issuer'])) {
    const issuer = stringAt(certificate['issuer']['O']) ?? stringAt(certificate['issuer']['CN']);
    if (issuer !== undefined) {
      note(stack, 'ssl_tls', `Certificate Issuer: ${issuer}`, `SSL certificate issued by: ${issuer}`);
    }
  }
}

function fromDns(stack: TechStack, payload: ProbePayload): void {
  const records = payload['records'];
  if (!isRecord(records)) return;

  const a = stringsAt(records['A']);
  if (a.length > 0) note(stack, 'hosting', undefined, `A records point to: ${a.join(', ')}`);

  const ns = stringsAt(records['NS']);
  if (ns.length > 0) note(stack, 'hosting', `Nameservers: ${ns.join(', ')}`, `DNS managed by: ${ns.join(', ')}`);

  for (const mx of stringsAt(records['MX'])) {
    note(stack, 'email', mx, `MX record: ${mx}`);
    const lowered = mx.toLowerCase();
    if (lowered.includes('google')) {
      note(stack, 'email', 'Google Workspace / Gmail', `MX record: ${mx}`);
    } else if (lowered.includes('outlook') || lowered.includes('office365')) {
      note(stack, 'email', 'Microsoft 365', `MX record: ${mx}`);
    }
  }
}

function fromCloud(stack: TechStack, payload: ProbePayload): void {
  const provider = stringAt(payload['provider']);
  if (provider !== undefined) note(stack, 'hosting', provider, `Reverse DNS matches ${provider}`);
}

function fromPorts(stack: TechStack, payload: ProbePayload): void {
  const openPorts = payload['openPorts'];
  if (!Array.isArray(openPorts)) return;
  for (const entry of openPorts) {
    if (!isRecord(entry) || typeof entry['port'] !== 'number') continue;
    const database = DATABASE_PORTS[entry['port']];
    if (database !== undefined) note(stack, 'database', database, `Port ${entry['port']} open (${database})`);
  }
}

function fromTechnology(stack: TechStack, payload: ProbePayload): void {
  const technologies = payload['technologies'];
  if (!Array.isArray(technologies)) return;
  for (const tech of technologies) {
    if (!isRecord(tech)) continue;
    const name = stringAt(tech['name']);
    const evidence = stringAt(tech['evidence']) ?? 'fingerprint';
    if (name === undefined) continue;
    switch (tech['category']) {
      case 'javascript':
      case 'cms':
        note(stack, 'frontend', name, evidence);
        break;
      case 'framework':
        note(stack, 'backend', name, evidence);
        break;
      case 'cdn':
        note(stack, 'cdn', name, evidence);
        break;
      case 'server':
        note(stack, 'web_server', name, evidence);
        break;
      default:
        break;
    }
  }
}

export function analyzeTechStack(result: ScanResult): TechStack {
  const stack = emptyStack();
  const contributors: ReadonlyArray<[string, (stack: TechStack, payload: ProbePayload) => void]> = [
    ['http', fromHttp],
    ['ssl', fromSsl],
    ['dns', fromDns],
    ['cloud_detection', fromCloud],
    ['ports', fromPorts],
    ['technology', fromTechnology],
  ];
  for (const [name, contribute] of contributors) {
    const payload = successPayload(result, name);
    if (payload !== undefined) contribute(stack, payload);
  }
  return stack;
}
