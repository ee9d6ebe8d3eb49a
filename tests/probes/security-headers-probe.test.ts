import { describe, it, expect } from 'vitest';
import { analyzeHeaderValue, analyzeSecurityHeaders, gradeFor } from '../../src/probes/security-headers-probe.js';

const HARDENED: Record<string, string> = {
  'strict-transport-security': 'max-age=31536000; includeSubDomains',
  'x-frame-options': 'DENY',
  'x-content-type-options': 'nosniff',
  'content-security-policy': "default-src 'self'",
  'x-xss-protection': '1; mode=block',
  'referrer-policy': 'no-referrer',
  'permissions-policy': 'camera=()',
};

describe('gradeFor', () => {
  it('スコアの境界', () => {
    expect(gradeFor(100)).toEqual({ grade: 'A', severity: 'info' });
    expect(gradeFor(80)).toEqual({ grade: 'A', severity: 'info' });
    expect(gradeFor(79)).toEqual({ grade: 'B', severity: 'low' });
    expect(gradeFor(60)).toEqual({ grade: 'B', severity: 'low' });
    expect(gradeFor(40)).toEqual({ grade: 'C', severity: 'medium' });
    expect(gradeFor(39)).toEqual({ grade: 'F', severity: 'high' });
  });
});

describe('analyzeHeaderValue', () => {
  it('短い HSTS max-age と includeSubDomains 欠如', () => {
    expect(analyzeHeaderValue('Strict-Transport-Security', 'max-age=3600').map((f) => [f.severity, f.title])).toEqual([
      ['medium', 'HSTS max-age too short'],
      ['low', 'HSTS without includeSubDomains'],
    ]);
  });

  it('X-Frame-Options は DENY / SAMEORIGIN 以外を弱いとする', () => {
    expect(analyzeHeaderValue('X-Frame-Options', 'sameorigin')).toEqual([]);
    expect(analyzeHeaderValue('X-Frame-Options', 'ALLOW-FROM https://example.org')[0]?.title).toBe(
      'Weak X-Frame-Options value',
    );
  });

  it('CSP の unsafe-inline と unsafe-eval', () => {
    const findings = analyzeHeaderValue('Content-Security-Policy', "script-src 'self' 'unsafe-inline' 'unsafe-eval'");
    expect(findings.map((f) => f.title)).toEqual(['CSP allows unsafe-inline', 'CSP allows unsafe-eval']);
  });

  it('X-XSS-Protection: 0 は無効化', () => {
    expect(analyzeHeaderValue('X-XSS-Protection', '0')[0]?.title).toBe('XSS Protection disabled');
  });
});

describe('analyzeSecurityHeaders', () => {
  it('全ヘッダーが適切なら評価 A の Finding のみ', () => {
    const analysis = analyzeSecurityHeaders(HARDENED);

    expect(analysis.score).toBe(100);
    expect(analysis.grade).toBe('A');
    expect(analysis.missingHeaders).toEqual([]);
    expect(analysis.findings).toEqual([
      {
        severity: 'info',
        title: 'Security headers score: 100/100 (Grade: A)',
        description: 'Site implements 100% of recommended security headers',
      },
    ]);
    expect(analysis.headers['X-Frame-Options']).toBe('DENY');
  });

  it('ヘッダーが無ければスコア 0、評価 F、欠落ごとに Finding', () => {
    const analysis = analyzeSecurityHeaders({});

    expect(analysis.score).toBe(0);
    expect(analysis.grade).toBe('F');
    expect(analysis.findings).toHaveLength(8);
    expect(analysis.findings[0]).toMatchObject({ severity: 'high', title: 'Security headers score: 0/100 (Grade: F)' });
    expect(analysis.findings[1]).toMatchObject({
      severity: 'high',
      title: 'Missing security header: Strict-Transport-Security',
    });
  });

  it('7 つ中 5 つならスコア 71、評価 B', () => {
    const partial = { ...HARDENED };
    delete partial['referrer-policy'];
    delete partial['permissions-policy'];

    const analysis = analyzeSecurityHeaders(partial);

    expect(analysis.score).toBe(71);
    expect(analysis.grade).toBe('B');
    expect(analysis.missingHeaders).toEqual(['Referrer-Policy', 'Permissions-Policy']);
    expect(analysis.findings[0]?.severity).toBe('low');
  });
});
