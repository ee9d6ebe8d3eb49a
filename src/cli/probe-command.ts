/**
 * mimizuku — probe command
 *
 * 同意確認 → 設定解決 → スキャン実行 → レポート出力 → 履歴保存。
 * SIGINT を受けたら全 Probe を中断し、レポートを書かずに終了コード 1 を返す。
 */

import Database from 'better-sqlite3';
import chalk from 'chalk';
import Table from 'cli-table3';
import { loadConfig, toTimeoutPolicy } from '../config/config.js';
import type { CliOverrides } from '../config/config.js';
import { migrateDatabase } from '../db/migrate.js';
import { ScanRepository } from '../db/repository/scan-repository.js';
import { createCredentialLookup } from '../engine/credential-gate.js';
import { PROBE_REGISTRY } from '../engine/registry.js';
import { executeScan } from '../engine/scan-service.js';
import { createLogger, loggerOptionsFromEnv } from '../logger.js';
import { writeReports } from '../report/writer.js';
import type { ProbeDescriptor, Severity } from '../types/probe.js';
import { SEVERITIES } from '../types/probe.js';
import type { AggregatedReport } from '../types/report.js';
import { ensureConsent } from './consent.js';
import type { ConsentOptions } from './consent.js';

export interface ProbeCommandOptions extends CliOverrides {
  config?: string;
  yes?: boolean;
}

export interface ProbeCommandDeps {
  registry?: readonly ProbeDescriptor[];
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  consent?: Omit<ConsentOptions, 'assumeYes'>;
  print?: (text: string) => void;
}

const SEVERITY_STYLES: Readonly<Record<Severity, (text: string) => string>> = {
  critical: (text) => chalk.bgRed.white.bold(text),
  high: (text) => chalk.red.bold(text),
  medium: (text) => chalk.yellow(text),
  low: (text) => chalk.cyan(text),
  info: (text) => chalk.gray(text),
};

/** 重大度別件数のテーブル。 */
export function renderSummaryTable(report: AggregatedReport): string {
  const table = new Table({
    head: ['Severity', 'Count'],
    style: { head: ['cyan'] },
  });
  for (const severity of SEVERITIES) {
    table.push([SEVERITY_STYLES[severity](severity.toUpperCase()), String(report.summary[severity])]);
  }
  table.push([chalk.bold('TOTAL'), chalk.bold(String(report.summary.total))]);
  return table.toString();
}

export function renderProbeStatusLine(report: AggregatedReport): string {
  const { successful, failed, skipped } = report.probeStatus;
  return (
    `Probes: ${chalk.green(`${successful.length} successful`)}, ` +
    `${chalk.red(`${failed.length} failed`)}, ${chalk.yellow(`${skipped.length} skipped`)}`
  );
}

/** 終了コードを返す（0: 完了または同意拒否、1: 中断）。致命的エラーは throw する。 */
export async function runProbeCommand(
  target: string,
  options: ProbeCommandOptions,
  deps: ProbeCommandDeps = {},
): Promise<number> {
  const print = deps.print ?? ((text: string) => console.log(text));
  const env = deps.env ?? process.env;

  const consented = await ensureConsent({ ...deps.consent, assumeYes: options.yes === true, print });
  if (!consented) {
    return 0;
  }

  const config = loadConfig({ configPath: options.config, cli: options, env, cwd: deps.cwd });
  const logger = createLogger(loggerOptionsFromEnv({ level: config.verbose ? 'debug' : 'info' }, env));

  const db = config.history ? new Database(config.dbPath) : undefined;
  const controller = new AbortController();
  const onSigint = (): void => {
    logger.warn('Interrupt received, cancelling in-flight probes...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    let repository: ScanRepository | undefined;
    if (db !== undefined) {
      migrateDatabase(db);
      repository = new ScanRepository(db);
    }

    const { result, report, stored } = await executeScan(
      {
        registry: deps.registry ?? PROBE_REGISTRY,
        credentials: createCredentialLookup(config.credentials),
        logger,
        timeouts: toTimeoutPolicy(config),
        repository,
      },
      { target, selection: config.probes, signal: controller.signal },
    );

    if (controller.signal.aborted) {
      print(chalk.red('\n\nScan interrupted by user'));
      return 1;
    }

    logger.info('Generating reports...');
    const written = await writeReports(result, report, { outputDir: config.outputDir, format: config.format });

    print('');
    print(renderSummaryTable(report));
    print(renderProbeStatusLine(report));
    print(`\nReports generated in: ${written.directory}`);
    for (const file of written.files) {
      print(`  - ${file}`);
    }
    if (stored !== undefined) {
      print(chalk.gray(`Scan stored in history as ${stored.id}`));
    }
    print(chalk.green(`\n✓ OSINT reconnaissance complete for ${target}`));
    return 0;
  } finally {
    process.removeListener('SIGINT', onSigint);
    db?.close();
  }
}
