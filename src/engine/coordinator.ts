/**
 * mimizuku — Scan Coordinator
 *
 * Registry から有効な Probe を選び、全てを同時に起動して（fan-out）、
 * 全 Probe が終端 Outcome に達するまで待つ（fan-in）。
 * Probe の失敗で Coordinator 自体が失敗することはない。
 */

import type { Logger } from 'pino';
import type {
  CredentialLookup,
  ProbeDescriptor,
  ProbeOutcome,
  ScanResult,
} from '../types/probe.js';
import { runProbe } from './runner.js';

/** タイムアウト方針（ミリ秒）。 */
export interface TimeoutPolicy {
  defaultMs: number;
  portScanMs: number;
}

export const DEFAULT_TIMEOUT_POLICY: TimeoutPolicy = {
  defaultMs: 60_000,
  portScanMs: 120_000,
};

export interface CoordinatorOptions {
  credentials: CredentialLookup;
  logger: Logger;
  /** 空 / undefined なら全 Probe を実行 */
  selection?: readonly string[];
  timeouts?: TimeoutPolicy;
}

export interface RunScanOptions {
  /** スキャン全体の中断（SIGINT） */
  signal?: AbortSignal;
  /** 各 Probe の Outcome 確定時に呼ばれる */
  onOutcome?: (name: string, outcome: ProbeOutcome) => void;
  /** テスト用の時刻注入 */
  now?: () => Date;
}

/** Descriptor に適用されるタイムアウト。ポートスキャン系は長い。 */
export function timeoutFor(descriptor: ProbeDescriptor, policy: TimeoutPolicy): number {
  return descriptor.portScan === true ? policy.portScanMs : policy.defaultMs;
}

/** 選択フィルタが空なら全て、そうでなければ名前が含まれるものだけ。 */
export function isEnabled(name: string, selection: readonly string[] | undefined): boolean {
  if (selection === undefined || selection.length === 0) {
    return true;
  }
  return selection.includes(name);
}

export class ScanCoordinator {
  private readonly registry: readonly ProbeDescriptor[];
  private readonly options: CoordinatorOptions;
  private readonly timeouts: TimeoutPolicy;

  constructor(registry: readonly ProbeDescriptor[], options: CoordinatorOptions) {
    const seen = new Set<string>();
    for (const descriptor of registry) {
      if (seen.has(descriptor.name)) {
        throw new Error(`Duplicate probe name in registry: ${descriptor.name}`);
      }
      seen.add(descriptor.name);
    }

    this.registry = [...registry];
    this.options = options;
    this.timeouts = options.timeouts ?? DEFAULT_TIMEOUT_POLICY;

    const unknown = (options.selection ?? []).filter((name) => !seen.has(name));
    if (unknown.length > 0) {
      options.logger.warn(
        { unknown, available: [...seen] },
        `Ignoring unknown probe name(s): ${unknown.join(', ')}`,
      );
    }
  }

  /** 今回の実行で有効な Probe（Registry 順）。 */
  enabledProbes(): ProbeDescriptor[] {
    return this.registry.filter((d) => isEnabled(d.name, this.options.selection));
  }

  async run(target: string, runOptions: RunScanOptions = {}): Promise<ScanResult> {
    const { logger, credentials } = this.options;
    const now = runOptions.now ?? (() => new Date());
    const scanTime = now().toISOString();
    const enabled = this.enabledProbes();

    logger.info(`Starting comprehensive OSINT scan on: ${target}`);
    logger.debug({ probes: enabled.map((d) => d.name) }, `${enabled.length} probe(s) enabled`);

    // 全 Probe を同時に起動する。runProbe は reject しないため、
    // Promise.all が reject するのはタスク起動自体の失敗のみ（致命的）。
    const tasks = enabled.map(async (descriptor): Promise<[string, ProbeOutcome]> => {
      const outcome = await runProbe(
        target,
        {
          name: descriptor.name,
          priority: descriptor.priority,
          timeoutMs: timeoutFor(descriptor, this.timeouts),
          create: () => descriptor.create(),
        },
        credentials,
        { logger, signal: runOptions.signal },
      );
      try {
        runOptions.onOutcome?.(descriptor.name, outcome);
      } catch (err) {
        logger.warn({ err, probe: descriptor.name }, 'onOutcome callback failed');
      }
      return [descriptor.name, outcome];
    });

    const settled = await Promise.all(tasks);

    // 各スロットは 1 回だけ書き込まれる。キー順は Registry 順。
    const probes: Record<string, ProbeOutcome> = {};
    for (const [name, outcome] of settled) {
      probes[name] = outcome;
    }

    logger.info('All probes completed');
    return { target, scanTime, probes: Object.freeze(probes) };
  }
}
