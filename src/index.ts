#!/usr/bin/env node
/**
 * mimizuku — passive OSINT reconnaissance of a domain
 *
 * CLI エントリポイント。
 */

import chalk from 'chalk';
import { createProgram } from './cli/program.js';

try {
  await createProgram().parseAsync(process.argv);
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  console.error(chalk.red(`\n✗ Fatal error: ${message}`));
  process.exitCode = 1;
}
