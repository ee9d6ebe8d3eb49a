/**
 * mimizuku — CLI program
 *
 * commander によるサブコマンド定義。
 * 端末向けの出力は console + chalk / cli-table3、診断ログは pino に分ける。
 */

import { Command, InvalidArgumentError } from 'commander';
import Database from 'better-sqlite3';
import chalk from 'chalk';
import Table from 'cli-table3';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig, toTimeoutPolicy } from '../config/config.js';
import { migrateDatabase } from '../db/migrate.js';
import { ScanRepository } from '../db/repository/scan-repository.js';
import { DEFAULT_TIMEOUT_POLICY, timeoutFor } from '../engine/coordinator.js';
import { createCredentialLookup } from '../engine/credential-gate.js';
import { PROBE_REGISTRY } from '../engine/registry.js';
import { createLogger, loggerOptionsFromEnv } from '../logger.js';
import { createMcpServer } from '../mcp/server.js';
import type { StoredScan } from '../types/entities.js';
import type { ProbeDescriptor } from '../types/probe.js';
import { REPORT_FORMATS } from '../types/report.js';
import { VERSION } from '../version.js';
import { runProbeCommand } from './probe-command.js';
import type { ProbeCommandDeps, ProbeCommandOptions } from './probe-command.js';

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/** list-probes の表。 */
export function renderProbeTable(registry: readonly ProbeDescriptor[]): string {
  const table = new Table({
    head: ['Probe', 'Priority', 'Timeout', 'Credential', 'Description'],
    style: { head: ['cyan'] },
  });
  for (const descriptor of registry) {
    table.push([
      descriptor.name,
      descriptor.priority,
      `${timeoutFor(descriptor, DEFAULT_TIMEOUT_POLICY) / 1000}s`,
      descriptor.credential ?? '-',
      descriptor.description,
    ]);
  }
  return table.toString();
}

/** history の表。 */
export function renderHistoryTable(scans: readonly StoredScan[]): string {
  const table = new Table({
    head: ['ID', 'Target', 'Scan Time', 'Probes', 'Critical', 'High', 'Medium', 'Low', 'Info'],
    style: { head: ['cyan'] },
  });
  for (const scan of scans) {
    table.push([
      scan.id,
      scan.target,
      scan.scanTime,
      String(scan.probeCount),
      String(scan.summary.critical),
      String(scan.summary.high),
      String(scan.summary.medium),
      String(scan.summary.low),
      String(scan.summary.info),
    ]);
  }
  return table.toString();
}

export function createProgram(deps: ProbeCommandDeps = {}): Command {
  const registry = deps.registry ?? PROBE_REGISTRY;
  const print = deps.print ?? ((text: string) => console.log(text));
  const program = new Command();

  program
    .name('mimizuku')
    .description('Passive OSINT reconnaissance of a domain with parallel probes')
    .version(VERSION);

  program
    .command('probe')
    .description('Run probes against a target domain and write reports')
    .argument('<target>', 'Target domain to investigate')
    .option('-v, --verbose', 'Verbose output')
    .option('-o, --output <dir>', 'Output directory for reports (default: ./reports)')
    .option('-f, --format <format>', `Report format: ${REPORT_FORMATS.join(', ')} (default: all)`)
    .option('-p, --probes <names>', 'Comma-separated list of probes to run (default: all)')
    .option('-c, --config <path>', 'Path to JSON config file')
    .option('--no-history', 'Do not store the scan in the history database')
    .option('-y, --yes', 'Accept the usage warning without prompting')
    .addHelpText(
      'after',
      `
Examples:
  $ mimizuku probe example.com
  $ mimizuku probe example.com --format html
  $ mimizuku probe example.com --probes dns,whois,ssl
  $ mimizuku probe example.com --verbose --output ./reports`,
    )
    .action(async (target: string, options: ProbeCommandOptions) => {
      process.exitCode = await runProbeCommand(target, options, { ...deps, registry, print });
    });

  program
    .command('list-probes')
    .description('List available probes in execution order')
    .action(() => {
      print(renderProbeTable(registry));
    });

  program
    .command('history')
    .description('List stored scans, newest first')
    .argument('[target]', 'Only scans of this target')
    .option('-l, --limit <n>', 'Maximum number of scans', parsePositiveInt, 20)
    .option('-c, --config <path>', 'Path to JSON config file')
    .action((target: string | undefined, options: { limit: number; config?: string }) => {
      const config = loadConfig({ configPath: options.config, env: deps.env, cwd: deps.cwd });
      const db = new Database(config.dbPath);
      try {
        migrateDatabase(db);
        const scans = new ScanRepository(db).findAll({ target, limit: options.limit });
        if (scans.length === 0) {
          print(chalk.yellow('No scans found'));
          return;
        }
        print(renderHistoryTable(scans));
      } finally {
        db.close();
      }
    });

  program
    .command('serve')
    .description('Run the MCP server on stdio')
    .option('-c, --config <path>', 'Path to JSON config file')
    .action(async (options: { config?: string }) => {
      const env = deps.env ?? process.env;
      const config = loadConfig({ configPath: options.config, env, cwd: deps.cwd });
      // stdout は MCP プロトコルが使う
      const logger = createLogger(loggerOptionsFromEnv({ level: 'info', format: 'json', destination: 2 }, env));
      const db = new Database(config.dbPath);
      migrateDatabase(db);

      const server = createMcpServer({
        db,
        registry,
        credentials: createCredentialLookup(config.credentials),
        logger,
        timeouts: toTimeoutPolicy(config),
      });
      await server.connect(new StdioServerTransport());
      logger.info({ dbPath: config.dbPath }, 'MCP server listening on stdio');
    });

  return program;
}
