/**
 * mimizuku — Logger
 *
 * pino ロガーの生成。pretty（pino-pretty トランスポート）と json の 2 形式。
 * MCP stdio サーバーとして動く場合は stdout をプロトコルが使うため stderr に出す。
 */

import pino from 'pino';
import type { Logger, LoggerOptions as PinoLoggerOptions, TransportSingleOptions } from 'pino';

export type { Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';
export type LogFormat = 'json' | 'pretty';

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** 1 = stdout, 2 = stderr */
  destination?: 1 | 2;
  name?: string;
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function createPrettyTransport(destination: 1 | 2): TransportSingleOptions {
  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss.l',
      ignore: 'pid,hostname',
      destination,
    },
  };
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', format = 'pretty', destination = 1, name = 'mimizuku' } = options;

  const config: PinoLoggerOptions = {
    name,
    level,
    serializers: { err: pino.stdSerializers.err },
  };

  if (format === 'pretty') {
    return pino({ ...config, transport: createPrettyTransport(destination) });
  }
  return pino(config, pino.destination({ fd: destination, sync: true }));
}

/**
 * 環境変数 MIMIZUKU_LOG_LEVEL / MIMIZUKU_LOG_FORMAT で上書きする。
 * 不正な値は無視する。
 */
export function loggerOptionsFromEnv(
  base: LoggerOptions,
  env: NodeJS.ProcessEnv = process.env,
): LoggerOptions {
  const options: LoggerOptions = { ...base };

  const level = env['MIMIZUKU_LOG_LEVEL']?.toLowerCase();
  if (level !== undefined && isLogLevel(level)) {
    options.level = level;
  }

  const format = env['MIMIZUKU_LOG_FORMAT']?.toLowerCase();
  if (format === 'json' || format === 'pretty') {
    options.format = format;
  }

  return options;
}

/** テスト・ライブラリ利用向けの無音ロガー。 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
