/**
 * mimizuku — Configuration
 *
 * 設定値の解決。優先順位（低 → 高）:
 *   既定値 → JSON 設定ファイル → 環境変数（.env を含む） → CLI フラグ
 * 認証情報だけは設定ファイルの値が環境変数より優先される。
 */

import fs from 'node:fs';
import path from 'node:path';
import { parse as parseDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../engine/errors.js';
import { credentialsFromEnv } from '../engine/credential-gate.js';
import type { TimeoutPolicy } from '../engine/coordinator.js';
import { REPORT_FORMATS } from '../types/report.js';
import type { ReportFormat } from '../types/report.js';

// ============================================================
// スキーマ
// ============================================================

const timeoutsSchema = z
  .object({
    defaultSeconds: z.number().positive().optional(),
    portScanSeconds: z.number().positive().optional(),
  })
  .strict();

export const fileConfigSchema = z
  .object({
    verbose: z.boolean().optional(),
    outputDir: z.string().min(1).optional(),
    format: z.enum(REPORT_FORMATS).optional(),
    probes: z.array(z.string().min(1)).optional(),
    timeouts: timeoutsSchema.optional(),
    credentials: z.record(z.string()).optional(),
    dbPath: z.string().min(1).optional(),
    history: z.boolean().optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

export interface Config {
  verbose: boolean;
  outputDir: string;
  format: ReportFormat;
  /** 空配列 = 全 Probe */
  probes: string[];
  timeouts: {
    defaultSeconds: number;
    portScanSeconds: number;
  };
  credentials: Record<string, string>;
  dbPath: string;
  history: boolean;
}

export const DEFAULT_CONFIG: Readonly<Config> = Object.freeze({
  verbose: false,
  outputDir: './reports',
  format: 'all',
  probes: [],
  timeouts: { defaultSeconds: 60, portScanSeconds: 120 },
  credentials: {},
  dbPath: 'mimizuku.db',
  history: true,
});

/** CLI から渡される生の値（commander のオプション）。 */
export interface CliOverrides {
  verbose?: boolean;
  output?: string;
  format?: string;
  probes?: string;
  history?: boolean;
}

export interface LoadConfigOptions {
  configPath?: string;
  cli?: CliOverrides;
  env?: NodeJS.ProcessEnv;
  /** .env を探すディレクトリ */
  cwd?: string;
}

// ============================================================
// 各ソースの読み込み
// ============================================================

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

/** JSON 設定ファイルを読み、スキーマ検証する。 */
export function readConfigFile(configPath: string): FileConfig {
  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read config file ${configPath}`, [reason]);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Config file ${configPath} is not valid JSON`, [reason]);
  }

  const parsed = fileConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${configPath}`, formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * cwd の .env を読み、プロセス環境変数と合成する。
 * 既に設定されている環境変数は .env で上書きしない。
 */
export function loadEnvironment(cwd: string, env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const envPath = path.join(cwd, '.env');
  if (!fs.existsSync(envPath)) {
    return { ...env };
  }
  const fromFile = parseDotenv(fs.readFileSync(envPath));
  return { ...fromFile, ...env };
}

/** "dns, ssl,,http" → ['dns', 'ssl', 'http'] */
export function parseProbeList(value: string): string[] {
  return value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name !== '');
}

function parseFormat(value: string): ReportFormat {
  const format = REPORT_FORMATS.find((f) => f === value.toLowerCase());
  if (format === undefined) {
    throw new ConfigError(`Invalid report format: ${value}`, [`expected one of ${REPORT_FORMATS.join(', ')}`]);
  }
  return format;
}

// ============================================================
// 解決
// ============================================================

export function loadConfig(options: LoadConfigOptions = {}): Config {
  const { configPath, cli = {}, env = process.env, cwd = process.cwd() } = options;

  const file = configPath !== undefined ? readConfigFile(configPath) : {};
  const environment = loadEnvironment(cwd, env);

  const config: Config = {
    verbose: file.verbose ?? DEFAULT_CONFIG.verbose,
    outputDir: file.outputDir ?? DEFAULT_CONFIG.outputDir,
    format: file.format ?? DEFAULT_CONFIG.format,
    probes: file.probes ?? [...DEFAULT_CONFIG.probes],
    timeouts: {
      defaultSeconds: file.timeouts?.defaultSeconds ?? DEFAULT_CONFIG.timeouts.defaultSeconds,
      portScanSeconds: file.timeouts?.portScanSeconds ?? DEFAULT_CONFIG.timeouts.portScanSeconds,
    },
    credentials: { ...credentialsFromEnv(environment), ...(file.credentials ?? {}) },
    dbPath: file.dbPath ?? DEFAULT_CONFIG.dbPath,
    history: file.history ?? DEFAULT_CONFIG.history,
  };

  const envDbPath = environment['MIMIZUKU_DB_PATH']?.trim();
  if (envDbPath) {
    config.dbPath = envDbPath;
  }

  if (cli.verbose === true) config.verbose = true;
  if (cli.output !== undefined) config.outputDir = cli.output;
  if (cli.format !== undefined) config.format = parseFormat(cli.format);
  if (cli.probes !== undefined) config.probes = parseProbeList(cli.probes);
  if (cli.history === false) config.history = false;

  return config;
}

/** 秒単位の設定を Coordinator のミリ秒ポリシーにする。 */
export function toTimeoutPolicy(config: Pick<Config, 'timeouts'>): TimeoutPolicy {
  return {
    defaultMs: config.timeouts.defaultSeconds * 1000,
    portScanMs: config.timeouts.portScanSeconds * 1000,
  };
}
