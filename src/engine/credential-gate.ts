/**
 * mimizuku — Credential Gate
 *
 * 外部サービス名から認証情報を引く純粋関数を組み立てる。
 * 値の供給元（設定ファイル・環境変数）は config 層が担い、ここでは形だけを定義する。
 */

import type { CredentialLookup } from '../types/probe.js';

/** 既知の外部サービスと対応する環境変数。 */
export const CREDENTIAL_ENV_VARS: Readonly<Record<string, string>> = {
  shodan: 'SHODAN_API_KEY',
  censys: 'CENSYS_API_ID',
  virustotal: 'VIRUSTOTAL_API_KEY',
  github: 'GITHUB_TOKEN',
  twitter: 'TWITTER_BEARER_TOKEN',
  newsapi: 'NEWSAPI_KEY',
  hibp: 'HIBP_API_KEY',
  securitytrails: 'SECURITYTRAILS_API_KEY',
};

/**
 * 環境変数から既知サービスの認証情報を集める。
 * 空文字列は未設定として扱う。
 */
export function credentialsFromEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [service, variable] of Object.entries(CREDENTIAL_ENV_VARS)) {
    const value = env[variable]?.trim();
    if (value) {
      result[service] = value;
    }
  }
  return result;
}

/**
 * 認証情報マップから CredentialLookup を作る。
 * 後に渡したソースが優先される。構築後のマップは凍結され、lookup は冪等。
 */
export function createCredentialLookup(
  ...sources: ReadonlyArray<Readonly<Record<string, string | undefined>>>
): CredentialLookup {
  const merged = new Map<string, string>();
  for (const source of sources) {
    for (const [service, value] of Object.entries(source)) {
      const trimmed = value?.trim();
      if (trimmed) {
        merged.set(service.toLowerCase(), trimmed);
      }
    }
  }
  const frozen: ReadonlyMap<string, string> = merged;
  return (service: string) => frozen.get(service.toLowerCase());
}

/** 認証情報を一切持たない lookup。 */
export const noCredentials: CredentialLookup = () => undefined;
