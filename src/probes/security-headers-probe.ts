/**
 * mimizuku — Security Headers Probe
 *
 * HTTPS レスポンスのセキュリティヘッダー 7 種を確認し、0-100 のスコアと
 * A/B/C/F の評価を付ける。評価 Finding は常に先頭に置く。
 */

import type { CredentialLookup, Finding, Probe, ProbeContext, ProbePayload, Severity } from '../types/probe.js';
import { createFinding } from './base.js';
import { fetchWithDeadline, headerValue, headersToRecord } from './http-client.js';

interface HeaderRule {
  name: string;
  severity: Severity;
  description: string;
  recommendation: string;
}

export const SECURITY_HEADERS: readonly HeaderRule[] = [
  {
    name: 'Strict-Transport-Security',
    severity: 'high',
    description: 'HSTS header missing - site vulnerable to SSL stripping',
    recommendation: 'Add Strict-Transport-Security header with max-age',
  },
  {
    name: 'X-Frame-Options',
    severity: 'medium',
    description: 'X-Frame-Options header missing - vulnerable to clickjacking',
    recommendation: 'Add X-Frame-Options: DENY or SAMEORIGIN',
  },
  {
    name: 'X-Content-Type-Options',
    severity: 'medium',
    description: 'X-Content-Type-Options header missing - vulnerable to MIME sniffing',
    recommendation: 'Add X-Content-Type-Options: nosniff',
  },
  {
    name: 'Content-Security-Policy',
    severity: 'high',
    description: 'CSP header missing - vulnerable to XSS attacks',
    recommendation: 'Implement Content-Security-Policy header',
  },
  {
    name: 'X-XSS-Protection',
    severity: 'low',
    description: 'X-XSS-Protection header missing',
    recommendation: 'Add X-XSS-Protection: 1; mode=block (legacy browsers)',
  },
  {
    name: 'Referrer-Policy',
    severity: 'low',
    description: 'Referrer-Policy header missing',
    recommendation: 'Add Referrer-Policy to control referrer information',
  },
  {
    name: 'Permissions-Policy',
    severity: 'low',
    description: 'Permissions-Policy header missing',
    recommendation: 'Add Permissions-Policy to control browser features',
  },
];

/** HSTS max-age の推奨下限（1 年） */
const HSTS_MIN_MAX_AGE = 31_536_000;

export type HeaderGrade = 'A' | 'B' | 'C' | 'F';

export interface HeaderAnalysis {
  headers: Record<string, string>;
  missingHeaders: string[];
  score: number;
  grade: HeaderGrade;
  findings: Finding[];
}

export interface SecurityHeadersPayload extends ProbePayload {
  headers: Record<string, string>;
  missingHeaders: string[];
  score: number;
  grade?: HeaderGrade;
  error?: string;
}

export function gradeFor(score: number): { grade: HeaderGrade; severity: Severity } {
  if (score >= 80) return { grade: 'A', severity: 'info' };
  if (score >= 60) return { grade: 'B', severity: 'low' };
  if (score >= 40) return { grade: 'C', severity: 'medium' };
  return { grade: 'F', severity: 'high' };
}

/** 個々のヘッダー値の設定ミスを検出する。 */
export function analyzeHeaderValue(name: string, value: string): Finding[] {
  const findings: Finding[] = [];

  switch (name) {
    case 'Strict-Transport-Security': {
      const maxAge = /max-age=(\d+)/i.exec(value)?.[1];
      if (maxAge !== undefined && Number(maxAge) < HSTS_MIN_MAX_AGE) {
        findings.push(
          createFinding('medium', 'HSTS max-age too short', `HSTS max-age is ${maxAge} seconds`, {
            recommendation: 'Use max-age of at least 31536000 (1 year)',
          }),
        );
      }
      if (!value.includes('includeSubDomains')) {
        findings.push(
          createFinding('low', 'HSTS without includeSubDomains', "HSTS header doesn't include subdomains", {
            recommendation: "Consider adding 'includeSubDomains' directive",
          }),
        );
      }
      break;
    }
    case 'X-Frame-Options':
      if (!['DENY', 'SAMEORIGIN'].includes(value.toUpperCase())) {
        findings.push(
          createFinding('medium', 'Weak X-Frame-Options value', `X-Frame-Options is set to '${value}'`, {
            recommendation: "Use 'DENY' or 'SAMEORIGIN'",
          }),
        );
      }
      break;
    case 'Content-Security-Policy':
      if (value.includes("'unsafe-inline'")) {
        findings.push(
          createFinding(
            'medium',
            'CSP allows unsafe-inline',
            "Content-Security-Policy allows 'unsafe-inline' which weakens XSS protection",
            { recommendation: "Remove 'unsafe-inline' and use nonces or hashes" },
          ),
        );
      }
      if (value.includes("'unsafe-eval'")) {
        findings.push(
          createFinding('medium', 'CSP allows unsafe-eval', "Content-Security-Policy allows 'unsafe-eval'", {
            recommendation: "Remove 'unsafe-eval' directive",
          }),
        );
      }
      break;
    case 'X-XSS-Protection':
      if (value.trim() === '0') {
        findings.push(
          createFinding('medium', 'XSS Protection disabled', 'X-XSS-Protection is explicitly disabled', {
            recommendation: 'Set X-XSS-Protection: 1; mode=block',
          }),
        );
      }
      break;
    default:
      break;
  }

  return findings;
}

/** レスポンスヘッダー全体を評価する。評価 Finding が先頭。 */
export function analyzeSecurityHeaders(responseHeaders: Readonly<Record<string, string>>): HeaderAnalysis {
  const headers: Record<string, string> = {};
  const missingHeaders: string[] = [];
  const findings: Finding[] = [];
  let present = 0;

  for (const rule of SECURITY_HEADERS) {
    const value = headerValue(responseHeaders, rule.name);
    if (value !== undefined) {
      headers[rule.name] = value;
      present += 1;
      findings.push(...analyzeHeaderValue(rule.name, value));
    } else {
      missingHeaders.push(rule.name);
      findings.push(
        createFinding(rule.severity, `Missing security header: ${rule.name}`, rule.description, {
          recommendation: rule.recommendation,
        }),
      );
    }
  }

  const score = Math.floor((present / SECURITY_HEADERS.length) * 100);
  const { grade, severity } = gradeFor(score);
  findings.unshift(
    createFinding(
      severity,
      `Security headers score: ${score}/100 (Grade: ${grade})`,
      `Site implements ${score}% of recommended security headers`,
    ),
  );

  return { headers, missingHeaders, score, grade, findings };
}

export class SecurityHeadersProbe implements Probe {
  async scan(
    target: string,
    _credentials: CredentialLookup,
    { signal, logger }: ProbeContext,
  ): Promise<SecurityHeadersPayload> {
    const payload: SecurityHeadersPayload = { headers: {}, missingHeaders: [], score: 0, findings: [] };

    try {
      const response = await fetchWithDeadline(`https://${target}`, signal);
      await response.body?.cancel();
      const analysis = analyzeSecurityHeaders(headersToRecord(response.headers));
      payload.headers = analysis.headers;
      payload.missingHeaders = analysis.missingHeaders;
      payload.score = analysis.score;
      payload.grade = analysis.grade;
      payload.findings.push(...analysis.findings);
    } catch (err) {
      signal.throwIfAborted();
      payload.error = err instanceof Error ? err.message : String(err);
      logger.debug({ err }, 'Error analyzing security headers');
    }

    return payload;
  }
}
