/**
 * mimizuku — DNS resolver helpers
 *
 * node:dns/promises の Resolver を Probe の signal に紐付ける。
 * abort 時は resolver.cancel() で未完了クエリを全て打ち切る。
 */

import { Resolver } from 'node:dns/promises';

/** Resolver 1 回の試行タイムアウト（ms） */
const QUERY_TIMEOUT_MS = 3000;
const QUERY_TRIES = 2;

/**
 * signal の abort で cancel される Resolver を fn に渡す。
 * fn の完了後は abort リスナーを外し、期限切れで残ったクエリも cancel する。
 */
export async function withResolver<T>(signal: AbortSignal, fn: (resolver: Resolver) => Promise<T>): Promise<T> {
  const resolver = new Resolver({ timeout: QUERY_TIMEOUT_MS, tries: QUERY_TRIES });
  const onAbort = (): void => resolver.cancel();
  if (signal.aborted) {
    resolver.cancel();
  } else {
    signal.addEventListener('abort', onAbort, { once: true });
  }
  try {
    return await fn(resolver);
  } finally {
    signal.removeEventListener('abort', onAbort);
    resolver.cancel();
  }
}

/** DNS エラーコードを取り出す（ENOTFOUND, ENODATA, ETIMEOUT など）。 */
export function dnsErrorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    return typeof err.code === 'string' ? err.code : undefined;
  }
  return undefined;
}

/** 名前が存在しない、またはレコードが無いことを示すコード。 */
export function isNoRecordError(err: unknown): boolean {
  const code = dnsErrorCode(err);
  return code === 'ENOTFOUND' || code === 'ENODATA';
}

/**
 * ターゲットの IPv4 アドレスを 1 つ解決する。
 * 解決できなければ例外をそのまま投げる。
 */
export async function resolveAddress(target: string, signal: AbortSignal): Promise<string> {
  const addresses = await withResolver(signal, (resolver) => resolver.resolve4(target));
  const first = addresses[0];
  if (first === undefined) {
    throw new Error(`Could not resolve hostname: ${target}`);
  }
  return first;
}
