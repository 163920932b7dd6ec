/**
 * Terminal output for the ragsql CLI.
 * Everything here writes to stdout; structured logs go through utils/logger.ts instead.
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import boxen from 'boxen';
import gradient from 'gradient-string';

type Tone = 'neutral' | 'success' | 'failure';

const TONES: Record<Tone, { border: string; paint: (text: string) => string }> = {
  neutral: { border: 'cyan', paint: (text) => text },
  success: { border: 'green', paint: gradient(['#00ff88', '#00cc77']) },
  failure: { border: 'red', paint: gradient(['#ff4444', '#cc0000']) },
};

const accent = gradient(['#00F5FF', '#00B4FF']);
const RULE_WIDTH = 50;

const rule = () => chalk.gray('─'.repeat(RULE_WIDTH));

export function printBanner(): void {
  console.log('');
  console.log(`  ${accent('ragsql')}  ${chalk.gray('ask your database in plain words')}`);
  console.log(`  ${rule()}`);
}

export function success(message: string): void {
  console.log(`${chalk.green('✔')} ${message}`);
}

/**
 * Failure line with an optional hint underneath.
 */
export function error(message: string, hint?: string): void {
  console.log(`${chalk.red('✖')} ${message}`);
  if (hint) {
    console.log(`  ${chalk.yellow('→')} ${chalk.dim(hint)}`);
  }
}

export function info(message: string): void {
  console.log(`${chalk.blue('ℹ')} ${message}`);
}

export function spinner(text: string): Ora {
  return ora({ text, color: 'cyan', spinner: 'dots' }).start();
}

/**
 * Boxed block of text, used for help, analyses and completion notices.
 */
export function panel(message: string, title?: string, tone: Tone = 'neutral'): void {
  const { border, paint } = TONES[tone];
  console.log(
    boxen(paint(message), {
      padding: 1,
      margin: 1,
      borderStyle: 'round',
      borderColor: border,
      title,
      titleAlignment: 'center',
    })
  );
}

/**
 * SQL (or any code) between two rules.
 */
export function code(content: string, language?: string): void {
  console.log(rule());
  if (language) {
    console.log(chalk.gray(`# ${language}`));
  }
  console.log(chalk.cyan(content));
  console.log(rule());
}

export function section(title: string): void {
  console.log('');
  console.log(accent(`▶ ${title}`));
  console.log(rule());
}

export function newline(): void {
  console.log('');
}

/**
 * `label: value` with a pass/fail mark.
 */
export function row(label: string, value: string, ok: boolean = true): void {
  const mark = ok ? chalk.green('✔') : chalk.red('✖');
  console.log(`  ${mark} ${chalk.bold(label)}: ${chalk.cyan(value)}`);
}

export function link(text: string, url: string): void {
  console.log(`  ${chalk.blue('→')} ${text}: ${chalk.cyan.underline(url)}`);
}
