/**
 * mimizuku — HTTP helpers
 *
 * グローバル fetch に Probe の signal と個別の期限を合成して渡す。
 */

import { deadline } from './base.js';

/** HTTP リクエスト 1 回の上限（ms） */
export const HTTP_TIMEOUT_MS = 10_000;

const USER_AGENT = 'mimizuku/0.1 (+passive reconnaissance)';

export interface FetchOptions {
  timeoutMs?: number;
  redirect?: RequestInit['redirect'];
  method?: string;
}

export async function fetchWithDeadline(
  url: string,
  signal: AbortSignal,
  options: FetchOptions = {},
): Promise<Response> {
  const { timeoutMs = HTTP_TIMEOUT_MS, redirect = 'follow', method = 'GET' } = options;
  return fetch(url, {
    method,
    redirect,
    signal: deadline(signal, timeoutMs),
    headers: { 'User-Agent': USER_AGENT },
  });
}

/** Headers を小文字キーのプレーンオブジェクトにする。 */
export function headersToRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {};
  headers.forEach((value, key) => {
    record[key.toLowerCase()] = value;
  });
  return record;
}

/** 大文字小文字を区別せずにヘッダー値を引く。 */
export function headerValue(headers: Readonly<Record<string, string>>, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}
