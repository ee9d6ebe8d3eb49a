/**
 * mimizuku — Probe helpers
 *
 * 全 Probe 共通の Finding 生成・認証情報ガード・期限付き実行。
 */

import type { CredentialLookup, Finding, Severity } from '../types/probe.js';
import { MissingCapabilityError } from '../engine/errors.js';

/** 標準形式の Finding を作る。data / recommendation は指定時のみ付与。 */
export function createFinding(
  severity: Severity,
  title: string,
  description: string,
  extras: { data?: unknown; recommendation?: string } = {},
): Finding {
  return {
    severity,
    title,
    description,
    ...(extras.data !== undefined ? { data: extras.data } : {}),
    ...(extras.recommendation ? { recommendation: extras.recommendation } : {}),
  };
}

/**
 * 認証情報を要求するガード節。未設定なら MissingCapabilityError。
 * Probe はネットワーク I/O や payload 構築の前に呼ぶこと。
 */
export function requireCredential(credentials: CredentialLookup, service: string): string {
  const secret = credentials(service);
  if (secret === undefined || secret === '') {
    throw new MissingCapabilityError(service);
  }
  return secret;
}

/** Probe の signal と個別の期限を合成する。 */
export function deadline(signal: AbortSignal, timeoutMs: number): AbortSignal {
  return AbortSignal.any([signal, AbortSignal.timeout(timeoutMs)]);
}

/** 個別処理の期限切れ。Probe 内部で捕捉して Finding 化する用途。 */
export class DeadlineError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'DeadlineError';
  }
}

/**
 * Promise に期限を付ける。signal が abort されたらその reason で reject する。
 * onAbort は期限切れ・abort 時に呼ばれ、ソケット等の解放に使う。
 */
export function withDeadline<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
  signal: AbortSignal,
  onAbort?: () => void,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const cleanup = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', abortListener);
    };
    const abortListener = (): void => {
      cleanup();
      onAbort?.();
      reject(signal.reason);
    };
    const timer = setTimeout(() => {
      cleanup();
      onAbort?.();
      reject(new DeadlineError(label, timeoutMs));
    }, timeoutMs);

    if (signal.aborted) {
      abortListener();
      return;
    }
    signal.addEventListener('abort', abortListener, { once: true });

    promise.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      },
    );
  });
}
