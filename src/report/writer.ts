/**
 * mimizuku — Report writer
 *
 * <outputDir>/<target>/<YYYYMMDD_HHMMSS>/ を作り、指定形式のレポートを書き出す。
 * ディレクトリ作成・書き込みの失敗はそのまま呼び出し元に伝播する。
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import type { ScanResult } from '../types/probe.js';
import type { AggregatedReport, ReportFormat } from '../types/report.js';
import { renderHtmlReport } from './html-report.js';
import { renderJsonReport } from './json-report.js';
import { renderMarkdownReport } from './markdown-report.js';

export const PDF_NOTE_FILE = 'PDF_GENERATION_NOTE.txt';

const PDF_NOTE = `PDF output is not generated directly.
Open report.html in a browser and print it to PDF, or convert it with a
headless browser (for example: chromium --headless --print-to-pdf report.html).
`;

export interface WriteReportsOptions {
  outputDir: string;
  format: ReportFormat;
  now?: Date;
}

export interface WrittenReports {
  directory: string;
  files: string[];
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** UTC の YYYYMMDD_HHMMSS。 */
export function timestampDirName(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/** ターゲット名をディレクトリ名として安全な形にする。 */
export function targetDirName(target: string): string {
  const safe = target.replace(/[^A-Za-z0-9._-]/g, '_').replace(/^\.+/, '_');
  return safe === '' ? '_' : safe;
}

function wants(format: ReportFormat, kind: Exclude<ReportFormat, 'all'>): boolean {
  return format === 'all' || format === kind;
}

export async function writeReports(
  result: ScanResult,
  report: AggregatedReport,
  options: WriteReportsOptions,
): Promise<WrittenReports> {
  const now = options.now ?? new Date();
  const directory = path.join(options.outputDir, targetDirName(result.target), timestampDirName(now));
  await fs.mkdir(directory, { recursive: true });

  const files: string[] = [];
  const write = async (name: string, content: string): Promise<void> => {
    const file = path.join(directory, name);
    await fs.writeFile(file, content, 'utf8');
    files.push(file);
  };

  if (wants(options.format, 'json')) {
    await write('report.json', renderJsonReport(result, report, now));
  }
  if (wants(options.format, 'html')) {
    await write('report.html', renderHtmlReport(result, report, now));
  }
  if (wants(options.format, 'markdown')) {
    await write('report.md', renderMarkdownReport(result, report, now));
  }
  if (wants(options.format, 'pdf')) {
    await write(PDF_NOTE_FILE, PDF_NOTE);
  }

  return { directory, files };
}
