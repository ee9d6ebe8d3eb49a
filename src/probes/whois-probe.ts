/**
 * mimizuku — WHOIS Probe
 *
 * RDAP（rdap.org のブートストラップ経由）で登録情報を取得し、
 * ドメインの年齢・有効期限・連絡先の公開状況を評価する。
 */

import { z } from 'zod';
import type { CredentialLookup, Finding, Probe, ProbeContext, ProbePayload } from '../types/probe.js';
import { createFinding } from './base.js';
import { fetchWithDeadline } from './http-client.js';

export const RDAP_BASE_URL = 'https://rdap.org/domain/';

const DAY_MS = 86_400_000;

// ============================================================
// RDAP レスポンス
// ============================================================

const rdapEventSchema = z.object({
  eventAction: z.string(),
  eventDate: z.string().optional(),
});

interface RdapEntity {
  roles?: string[];
  vcardArray?: unknown[];
  entities?: RdapEntity[];
}

const rdapEntitySchema: z.ZodType<RdapEntity> = z.lazy(() =>
  z.object({
    roles: z.array(z.string()).optional(),
    vcardArray: z.array(z.unknown()).optional(),
    entities: z.array(rdapEntitySchema).optional(),
  }),
);

const rdapDomainSchema = z.object({
  events: z.array(rdapEventSchema).optional(),
  nameservers: z.array(z.object({ ldhName: z.string().optional() })).optional(),
  status: z.array(z.string()).optional(),
  entities: z.array(rdapEntitySchema).optional(),
});

export interface WhoisData {
  registrar?: string;
  creationDate?: string;
  expirationDate?: string;
  updatedDate?: string;
  nameservers: string[];
  status: string[];
  emails: string[];
  registrant?: string;
}

export interface WhoisPayload extends ProbePayload {
  whoisData?: WhoisData;
  error?: string;
}

function flattenEntities(entities: readonly RdapEntity[] | undefined): RdapEntity[] {
  if (entities === undefined) return [];
  return entities.flatMap((entity) => [entity, ...flattenEntities(entity.entities)]);
}

/** vCard (jCard) からプロパティ値を取り出す。["vcard", [[name, params, type, value], ...]] */
function vcardValues(entity: RdapEntity, property: string): string[] {
  const properties = entity.vcardArray?.[1];
  if (!Array.isArray(properties)) return [];
  const values: string[] = [];
  for (const item of properties) {
    if (Array.isArray(item) && item[0] === property && typeof item[3] === 'string' && item[3] !== '') {
      values.push(item[3]);
    }
  }
  return values;
}

function eventDate(events: ReadonlyArray<z.infer<typeof rdapEventSchema>>, action: string): string | undefined {
  return events.find((event) => event.eventAction === action)?.eventDate;
}

/** RDAP ドメインオブジェクトを WhoisData に正規化する。形が合わなければ例外。 */
export function parseRdap(json: unknown): WhoisData {
  const domain = rdapDomainSchema.parse(json);
  const events = domain.events ?? [];
  const entities = flattenEntities(domain.entities);
  const withRole = (role: string): RdapEntity[] => entities.filter((e) => e.roles?.includes(role) === true);

  const registrar = withRole('registrar').flatMap((e) => vcardValues(e, 'fn'))[0];
  const registrant = withRole('registrant').flatMap((e) => vcardValues(e, 'fn'))[0];
  const emails = [...new Set(entities.flatMap((e) => vcardValues(e, 'email')))];

  return {
    registrar,
    creationDate: eventDate(events, 'registration'),
    expirationDate: eventDate(events, 'expiration'),
    updatedDate: eventDate(events, 'last changed'),
    nameservers: (domain.nameservers ?? [])
      .map((ns) => ns.ldhName?.toLowerCase())
      .filter((name): name is string => name !== undefined),
    status: domain.status ?? [],
    emails,
    registrant,
  };
}

// ============================================================
// 分析（純粋関数）
// ============================================================

function isPrivacyAddress(email: string): boolean {
  const lowered = email.toLowerCase();
  return lowered.includes('privacy') || lowered.includes('proxy');
}

function daysBetween(from: number, to: number): number {
  return Math.floor((to - from) / DAY_MS);
}

export function analyzeWhois(data: WhoisData, now: Date): Finding[] {
  const findings: Finding[] = [];

  const created = data.creationDate !== undefined ? Date.parse(data.creationDate) : Number.NaN;
  if (!Number.isNaN(created)) {
    const ageDays = daysBetween(created, now.getTime());
    if (ageDays < 30) {
      findings.push(
        createFinding('medium', 'Newly registered domain', `Domain was registered only ${ageDays} days ago`, {
          recommendation: 'Newly registered domains may be associated with suspicious activity',
        }),
      );
    } else if (ageDays < 365) {
      findings.push(createFinding('low', 'Recently registered domain', `Domain was registered ${ageDays} days ago`));
    }
  }

  const expires = data.expirationDate !== undefined ? Date.parse(data.expirationDate) : Number.NaN;
  if (!Number.isNaN(expires)) {
    const daysUntilExpiry = daysBetween(now.getTime(), expires);
    if (daysUntilExpiry < 30) {
      findings.push(
        createFinding('high', 'Domain expiring soon', `Domain expires in ${daysUntilExpiry} days`, {
          recommendation: 'Renew domain registration',
        }),
      );
    }
  }

  if (data.emails.some(isPrivacyAddress)) {
    findings.push(
      createFinding('info', 'WHOIS privacy protection enabled', 'Domain uses privacy protection service'),
    );
  }

  const exposed: string[] = [];
  if (data.registrant) exposed.push('registrant name');
  if (data.emails.some((email) => !isPrivacyAddress(email))) exposed.push('email addresses');
  if (exposed.length > 0) {
    findings.push(
      createFinding(
        'low',
        'Exposed WHOIS information',
        `The following information is publicly visible: ${exposed.join(', ')}`,
        { data: { exposedFields: exposed }, recommendation: 'Consider using WHOIS privacy protection' },
      ),
    );
  }

  return findings;
}

export class WhoisProbe implements Probe {
  async scan(target: string, _credentials: CredentialLookup, { signal, logger }: ProbeContext): Promise<WhoisPayload> {
    logger.info(`  → Looking up registration data for ${target}`);

    try {
      const response = await fetchWithDeadline(`${RDAP_BASE_URL}${encodeURIComponent(target)}`, signal);
      if (!response.ok) {
        await response.body?.cancel();
        throw new Error(`RDAP lookup returned HTTP ${response.status}`);
      }
      const whoisData = parseRdap(await response.json());
      return { whoisData, findings: analyzeWhois(whoisData, new Date()) };
    } catch (err) {
      signal.throwIfAborted();
      const message = err instanceof Error ? err.message : String(err);
      logger.debug({ err }, 'WHOIS lookup failed');
      return {
        error: message,
        findings: [
          createFinding('low', 'WHOIS lookup failed', `Unable to retrieve WHOIS information: ${message}`),
        ],
      };
    }
  }
}
