/**
 * mimizuku — SSL/TLS Probe
 *
 * :443 に TLS 接続して証明書とネゴシエートされたプロトコルを評価する。
 * 証明書検証に失敗しても接続は維持し、検証エラーは Finding として報告する。
 */

import tls from 'node:tls';
import type { PeerCertificate, TLSSocket } from 'node:tls';
import type { CredentialLookup, Finding, Probe, ProbeContext, ProbePayload } from '../types/probe.js';
import { DeadlineError, createFinding, withDeadline } from './base.js';

const TLS_TIMEOUT_MS = 10_000;
const DAY_MS = 86_400_000;

export type KeyType = 'RSA' | 'EC' | 'unknown';

export interface CertificateInfo {
  subject: Record<string, string>;
  issuer: Record<string, string>;
  serialNumber: string;
  notBefore: string;
  notAfter: string;
  san: string[];
  keyType: KeyType;
  keySize?: number;
  fingerprint256: string;
}

export interface SslPayload extends ProbePayload {
  certificate?: CertificateInfo;
  protocol?: string;
  authorized?: boolean;
  vulnerabilities: Finding[];
  error?: string;
}

// ============================================================
// 証明書の正規化
// ============================================================

function toNameRecord(name: object | undefined): Record<string, string> {
  const record: Record<string, string> = {};
  if (name === undefined) return record;
  for (const [key, value] of Object.entries(name)) {
    record[key] = Array.isArray(value) ? value.map(String).join(', ') : String(value);
  }
  return record;
}

/** "DNS:a.example, DNS:b.example" → ['DNS:a.example', 'DNS:b.example'] */
export function parseSubjectAltName(value: string | undefined): string[] {
  if (value === undefined || value === '') return [];
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry !== '');
}

export function toCertificateInfo(cert: PeerCertificate): CertificateInfo {
  const keyType: KeyType = cert.modulus !== undefined ? 'RSA' : cert.asn1Curve !== undefined ? 'EC' : 'unknown';
  return {
    subject: toNameRecord(cert.subject),
    issuer: toNameRecord(cert.issuer),
    serialNumber: cert.serialNumber,
    notBefore: new Date(cert.valid_from).toISOString(),
    notAfter: new Date(cert.valid_to).toISOString(),
    san: parseSubjectAltName(cert.subjectaltname),
    keyType,
    ...(cert.bits !== undefined ? { keySize: cert.bits } : {}),
    fingerprint256: cert.fingerprint256,
  };
}

// ============================================================
// 分析（純粋関数）
// ============================================================

function sameName(a: Readonly<Record<string, string>>, b: Readonly<Record<string, string>>): boolean {
  const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
  for (const key of keys) {
    if (a[key] !== b[key]) return false;
  }
  return true;
}

export function analyzeCertificate(cert: CertificateInfo, now: Date): Finding[] {
  const findings: Finding[] = [];

  const daysUntilExpiry = Math.floor((Date.parse(cert.notAfter) - now.getTime()) / DAY_MS);
  if (daysUntilExpiry < 0) {
    findings.push(
      createFinding('critical', 'Certificate expired', `Certificate expired ${Math.abs(daysUntilExpiry)} days ago`, {
        recommendation: 'Renew SSL/TLS certificate immediately',
      }),
    );
  } else if (daysUntilExpiry < 30) {
    findings.push(
      createFinding('high', 'Certificate expiring soon', `Certificate expires in ${daysUntilExpiry} days`, {
        recommendation: 'Renew SSL/TLS certificate',
      }),
    );
  }

  const weak =
    cert.keySize !== undefined &&
    ((cert.keyType === 'RSA' && cert.keySize < 2048) || (cert.keyType === 'EC' && cert.keySize < 256));
  if (weak) {
    findings.push(
      createFinding('critical', 'Weak key size', `Certificate uses ${cert.keySize}-bit key`, {
        recommendation: 'Use at least 2048-bit RSA or 256-bit ECC keys',
      }),
    );
  }

  if (sameName(cert.subject, cert.issuer)) {
    findings.push(
      createFinding('medium', 'Self-signed certificate', 'Certificate is self-signed', {
        recommendation: 'Use certificate from trusted CA for production',
      }),
    );
  }

  return findings;
}

/** ネゴシエートされたプロトコルの脆弱性。TLSv1.2 以上は何も返さない。 */
export function analyzeProtocol(protocol: string | null | undefined): Finding[] {
  switch (protocol) {
    case 'SSLv2':
    case 'SSLv3':
      return [
        createFinding('critical', `${protocol} enabled`, `Outdated and vulnerable protocol ${protocol} is enabled`, {
          recommendation: 'Disable SSLv2 and SSLv3, use TLS 1.2 or higher',
        }),
      ];
    case 'TLSv1':
      return [
        createFinding('high', 'TLS 1.0 enabled', 'TLS 1.0 is deprecated and should be disabled', {
          recommendation: 'Use TLS 1.2 or TLS 1.3',
        }),
      ];
    case 'TLSv1.1':
      return [
        createFinding('medium', 'TLS 1.1 enabled', 'TLS 1.1 is deprecated', {
          recommendation: 'Prefer TLS 1.2 or TLS 1.3',
        }),
      ];
    default:
      return [];
  }
}

// ============================================================
// Probe
// ============================================================

function connect(target: string, signal: AbortSignal): Promise<TLSSocket> {
  let socket: TLSSocket | undefined;
  const connecting = new Promise<TLSSocket>((resolve, reject) => {
    const s = tls.connect({ host: target, port: 443, servername: target, rejectUnauthorized: false });
    socket = s;
    s.once('secureConnect', () => resolve(s));
    s.once('error', reject);
  });
  return withDeadline(connecting, TLS_TIMEOUT_MS, `TLS connect to ${target}:443`, signal, () => socket?.destroy());
}

export class SslProbe implements Probe {
  async scan(target: string, _credentials: CredentialLookup, { signal, logger }: ProbeContext): Promise<SslPayload> {
    logger.info(`  → Analyzing SSL/TLS certificate for ${target}`);
    const payload: SslPayload = { vulnerabilities: [], findings: [] };

    let socket: TLSSocket | undefined;
    try {
      socket = await connect(target, signal);
      const protocol = socket.getProtocol();
      payload.protocol = protocol ?? undefined;
      payload.authorized = socket.authorized;
      logger.info(`  ✓ Connected using ${protocol ?? 'unknown protocol'}`);

      if (!socket.authorized) {
        payload.findings.push(
          createFinding('high', 'SSL/TLS error', `SSL/TLS error encountered: ${String(socket.authorizationError)}`, {
            recommendation: 'Check SSL/TLS configuration',
          }),
        );
      }

      const peer = socket.getPeerCertificate();
      if (Object.keys(peer).length > 0) {
        payload.certificate = toCertificateInfo(peer);
        payload.findings.push(...analyzeCertificate(payload.certificate, new Date()));
      }

      payload.vulnerabilities = analyzeProtocol(protocol);
      payload.findings.push(...payload.vulnerabilities);
    } catch (err) {
      signal.throwIfAborted();
      if (err instanceof DeadlineError) {
        payload.findings.push(
          createFinding('medium', 'Connection timeout', `Unable to connect to ${target}:443 - connection timed out`),
        );
      } else if (err instanceof Error && 'code' in err && typeof err.code === 'string' && err.code.startsWith('ERR_SSL')) {
        payload.findings.push(
          createFinding('high', 'SSL/TLS error', `SSL/TLS error encountered: ${err.message}`, {
            recommendation: 'Check SSL/TLS configuration',
          }),
        );
      } else {
        payload.error = err instanceof Error ? err.message : String(err);
        logger.debug({ err }, 'SSL probe error');
      }
    } finally {
      socket?.destroy();
    }

    logger.info('  ✓ SSL probe completed');
    return payload;
  }
}
