import { describe, it, expect, afterEach, vi } from 'vitest';
import { RDAP_BASE_URL, WhoisProbe, analyzeWhois, parseRdap } from '../../src/probes/whois-probe.js';
import type { WhoisData } from '../../src/probes/whois-probe.js';
import { noCredentials } from '../../src/engine/credential-gate.js';
import { createSilentLogger } from '../../src/logger.js';

const NOW = new Date('2024-05-01T00:00:00.000Z');

const RDAP_RESPONSE = {
  objectClassName: 'domain',
  ldhName: 'EXAMPLE.COM',
  events: [
    { eventAction: 'registration', eventDate: '2024-04-21T00:00:00Z' },
    { eventAction: 'expiration', eventDate: '2024-05-11T00:00:00Z' },
    { eventAction: 'last changed', eventDate: '2024-04-22T00:00:00Z' },
  ],
  nameservers: [{ ldhName: 'NS1.EXAMPLE.NET' }, { ldhName: 'ns2.example.net' }, {}],
  status: ['client transfer prohibited'],
  entities: [
    {
      roles: ['registrar'],
      vcardArray: ['vcard', [['version', {}, 'text', '4.0'], ['fn', {}, 'text', 'Example Registrar Inc.']]],
      entities: [
        {
          roles: ['abuse'],
          vcardArray: ['vcard', [['email', {}, 'text', 'abuse@registrar.example']]],
        },
      ],
    },
    {
      roles: ['registrant'],
      vcardArray: [
        'vcard',
        [
          ['fn', {}, 'text', 'Example Org'],
          ['email', {}, 'text', 'abuse@registrar.example'],
        ],
      ],
    },
  ],
};

function whois(overrides: Partial<WhoisData> = {}): WhoisData {
  return { nameservers: [], status: [], emails: [], ...overrides };
}

describe('parseRdap', () => {
  it('RDAP ドメインオブジェクトを正規化する', () => {
    expect(parseRdap(RDAP_RESPONSE)).toEqual({
      registrar: 'Example Registrar Inc.',
      creationDate: '2024-04-21T00:00:00Z',
      expirationDate: '2024-05-11T00:00:00Z',
      updatedDate: '2024-04-22T00:00:00Z',
      nameservers: ['ns1.example.net', 'ns2.example.net'],
      status: ['client transfer prohibited'],
      emails: ['abuse@registrar.example'],
      registrant: 'Example Org',
    });
  });

  it('形が合わなければ例外', () => {
    expect(() => parseRdap({ events: 'yesterday' })).toThrow();
  });
});

describe('analyzeWhois', () => {
  it('新しく、期限が近く、連絡先が公開されたドメイン', () => {
    const findings = analyzeWhois(parseRdap(RDAP_RESPONSE), NOW);

    expect(findings.map((f) => [f.severity, f.title, f.description])).toEqual([
      ['medium', 'Newly registered domain', 'Domain was registered only 10 days ago'],
      ['high', 'Domain expiring soon', 'Domain expires in 10 days'],
      [
        'low',
        'Exposed WHOIS information',
        'The following information is publicly visible: registrant name, email addresses',
      ],
    ]);
    expect(findings[2]?.data).toEqual({ exposedFields: ['registrant name', 'email addresses'] });
  });

  it('1 年未満は low', () => {
    const findings = analyzeWhois(whois({ creationDate: '2024-01-01T00:00:00Z' }), NOW);
    expect(findings.map((f) => [f.severity, f.title])).toEqual([['low', 'Recently registered domain']]);
  });

  it('プライバシー保護のアドレスは公開扱いしない', () => {
    const findings = analyzeWhois(whois({ emails: ['contact@privacy-guard.example'] }), NOW);
    expect(findings.map((f) => f.title)).toEqual(['WHOIS privacy protection enabled']);
  });

  it('日付が無ければ年齢・期限は評価しない', () => {
    expect(analyzeWhois(whois(), NOW)).toEqual([]);
  });
});

describe('WhoisProbe', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const context = { signal: new AbortController().signal, logger: createSilentLogger() };

  it('RDAP を問い合わせて whoisData を返す', async () => {
    const requested: string[] = [];
    vi.stubGlobal('fetch', async (input: string | URL | Request) => {
      requested.push(String(input));
      return Response.json(RDAP_RESPONSE);
    });

    const payload = await new WhoisProbe().scan('example.com', noCredentials, context);

    expect(requested).toEqual([`${RDAP_BASE_URL}example.com`]);
    expect(payload.whoisData?.registrar).toBe('Example Registrar Inc.');
    expect(payload.findings.map((f) => f.title)).toContain('Exposed WHOIS information');
  });

  it('HTTP エラーは low Finding になる', async () => {
    vi.stubGlobal('fetch', async () => new Response('not found', { status: 404 }));

    const payload = await new WhoisProbe().scan('example.com', noCredentials, context);

    expect(payload.error).toBe('RDAP lookup returned HTTP 404');
    expect(payload.findings).toEqual([
      {
        severity: 'low',
        title: 'WHOIS lookup failed',
        description: 'Unable to retrieve WHOIS information: RDAP lookup returned HTTP 404',
      },
    ]);
  });
});
