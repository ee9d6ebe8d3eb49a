/**
 * mimizuku — First-run consent
 *
 * 初回実行時に利用上の注意を表示し、同意を得たらマーカーファイルを作る。
 * マーカーが存在すれば何も表示しない。
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import chalk from 'chalk';
import inquirer from 'inquirer';

export const DEFAULT_MARKER_PATH = path.join(os.homedir(), '.mimizuku-confirmed');

const RULE = '='.repeat(70);

export const USAGE_WARNING = `
This tool performs automated reconnaissance and information gathering.

CRITICAL WARNINGS:
  - Only use on domains you own or have explicit permission to test
  - OSINT activities may be logged and monitored by target systems
  - Some probes may trigger security alerts or rate limits
  - Improper use may violate laws, terms of service, or ethical guidelines

By continuing, you acknowledge:
  - You have read and understand these warnings
  - You will use this tool responsibly and ethically
  - You accept full responsibility for your actions
`;

export type ConfirmPrompt = (message: string) => Promise<boolean>;

export interface ConsentOptions {
  markerPath?: string;
  /** --yes: 確認せずに同意したものとして扱う */
  assumeYes?: boolean;
  prompt?: ConfirmPrompt;
  print?: (text: string) => void;
}

const inquirerPrompt: ConfirmPrompt = async (message) => {
  const { accepted } = await inquirer.prompt<{ accepted: boolean }>([
    { type: 'confirm', name: 'accepted', message, default: false },
  ]);
  return accepted;
};

export function hasConsent(markerPath: string = DEFAULT_MARKER_PATH): boolean {
  return fs.existsSync(markerPath);
}

function recordConsent(markerPath: string): void {
  fs.mkdirSync(path.dirname(markerPath), { recursive: true });
  fs.writeFileSync(markerPath, `${new Date().toISOString()}\n`, 'utf8');
}

/** 同意済み、または今回同意した場合に true。 */
export async function ensureConsent(options: ConsentOptions = {}): Promise<boolean> {
  const {
    markerPath = DEFAULT_MARKER_PATH,
    assumeYes = false,
    prompt = inquirerPrompt,
    print = (text: string) => console.log(text),
  } = options;

  if (hasConsent(markerPath)) {
    return true;
  }

  if (!assumeYes) {
    print(chalk.yellow(`\n${RULE}\nIMPORTANT: OSINT TOOL USAGE WARNING\n${RULE}`));
    print(USAGE_WARNING);
    print(chalk.yellow(RULE));

    const accepted = await prompt('Do you understand and accept these risks?');
    if (!accepted) {
      print(chalk.red('\n✗ Tool usage declined. Exiting.'));
      return false;
    }
  }

  recordConsent(markerPath);
  print(chalk.green('\n✓ Confirmation recorded. You will not be asked again.'));
  print(`  (To see this warning again, delete: ${markerPath})\n`);
  return true;
}
