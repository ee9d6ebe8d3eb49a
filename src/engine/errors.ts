/**
 * mimizuku — Error types
 *
 * Runner が Outcome 分類に使うエラークラス群。
 * MissingCapabilityError / ProbeTimeoutError / ScanInterruptedError は skipped、
 * それ以外は全て error として扱われる。
 */

/** 必要な認証情報が未設定。ネットワーク I/O の前に投げる。 */
export class MissingCapabilityError extends Error {
  readonly service: string;

  constructor(service: string) {
    super(`Missing capability: ${service} credential is not configured`);
    this.name = 'MissingCapabilityError';
    this.service = service;
  }
}

/** Runner のタイムアウト。Probe の signal の abort reason にもなる。 */
export class ProbeTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Probe timed out after ${formatSeconds(timeoutMs)} seconds`);
    this.name = 'ProbeTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** SIGINT などによるスキャン全体の中断。 */
export class ScanInterruptedError extends Error {
  constructor() {
    super('Scan interrupted');
    this.name = 'ScanInterruptedError';
  }
}

/** 設定ファイル・CLI 引数の不備。 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** ミリ秒を秒表記にする（60000 → "60", 1500 → "1.5"）。 */
export function formatSeconds(ms: number): string {
  return String(ms / 1000);
}

/** throw された任意の値をメッセージ文字列にする。 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message !== '' ? err.message : err.name;
  }
  if (typeof err === 'string') {
    return err;
  }
  return String(err);
}
