/**
 * mimizuku — Probe Runner
 *
 * Probe 1 つを制限時間付きで実行し、あらゆる失敗を ProbeOutcome に正規化する。
 * runProbe() は決して reject しない。Coordinator が兄弟 Probe の fan-out を
 * 止めないための境界。
 */

import type { Logger } from 'pino';
import type {
  CredentialLookup,
  Priority,
  Probe,
  ProbeOutcome,
  ProbePayload,
} from '../types/probe.js';
import { isProbePayload } from '../types/probe.js';
import {
  MissingCapabilityError,
  ProbeTimeoutError,
  ScanInterruptedError,
  describeError,
} from './errors.js';

/** 1 回の実行単位。 */
export interface ProbeTask {
  name: string;
  priority: Priority;
  timeoutMs: number;
  /** Probe インスタンスの生成。生成時の例外も error outcome になる。 */
  create(): Probe;
}

export interface RunProbeOptions {
  logger: Logger;
  /** スキャン全体の中断シグナル（SIGINT） */
  signal?: AbortSignal;
}

/** Payload が findings 配列を持ち、各要素が Finding の形をしているか検証する。 */
function assertPayload(value: unknown): asserts value is ProbePayload {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error('Probe returned no payload object');
  }
  if (!('findings' in value) || !Array.isArray(value.findings)) {
    throw new Error('Probe payload has no findings array');
  }
  if (!isProbePayload(value)) {
    throw new Error('Probe payload contains a malformed finding');
  }
}

export async function runProbe(
  target: string,
  task: ProbeTask,
  credentials: CredentialLookup,
  options: RunProbeOptions,
): Promise<ProbeOutcome> {
  const { name, priority, timeoutMs } = task;
  const logger = options.logger.child({ probe: name });
  const controller = new AbortController();
  const startedAt = performance.now();
  const elapsed = (): number => Math.round(performance.now() - startedAt);

  let timer: NodeJS.Timeout | undefined;
  let onInterrupt: (() => void) | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new ProbeTimeoutError(timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });

  const interrupted = new Promise<never>((_, reject) => {
    const external = options.signal;
    if (external === undefined) return;
    onInterrupt = () => {
      const err = new ScanInterruptedError();
      controller.abort(err);
      reject(err);
    };
    if (external.aborted) {
      onInterrupt();
    } else {
      external.addEventListener('abort', onInterrupt, { once: true });
    }
  });

  try {
    logger.info(`Running ${name} probe...`);
    // create() / scan() の同期 throw も reject として扱う
    const scan = Promise.resolve().then(() => {
      controller.signal.throwIfAborted();
      return task.create().scan(target, credentials, {
        signal: controller.signal,
        logger,
      });
    });
    const payload: unknown = await Promise.race([scan, timeout, interrupted]);
    assertPayload(payload);

    logger.info({ findings: payload.findings.length, durationMs: elapsed() }, `${name} probe completed`);
    return { status: 'success', priority, durationMs: elapsed(), data: payload };
  } catch (err) {
    if (err instanceof ProbeTimeoutError) {
      logger.warn(`${name} probe timed out after ${err.timeoutMs / 1000}s`);
      return { status: 'skipped', priority, durationMs: elapsed(), reason: err.message };
    }
    if (err instanceof MissingCapabilityError) {
      logger.info(`${name} probe skipped: ${err.message}`);
      return { status: 'skipped', priority, durationMs: elapsed(), reason: err.message };
    }
    if (err instanceof ScanInterruptedError) {
      logger.warn(`${name} probe cancelled: ${err.message}`);
      return { status: 'skipped', priority, durationMs: elapsed(), reason: err.message };
    }
    const message = describeError(err);
    logger.error({ err }, `Error in ${name} probe: ${message}`);
    return { status: 'error', priority, durationMs: elapsed(), error: message };
  } finally {
    clearTimeout(timer);
    if (onInterrupt !== undefined) {
      options.signal?.removeEventListener('abort', onInterrupt);
    }
    // 勝敗に関わらず Probe 側のソケット等を解放させる
    if (!controller.signal.aborted) {
      controller.abort(new Error(`${name} probe finished`));
    }
  }
}
