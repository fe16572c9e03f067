/**
 * Terminal output helpers for the CLI: colors, spinners, boxes and tables.
 */

import chalk from 'chalk';
import ora from 'ora';
import boxen from 'boxen';
import gradient from 'gradient-string';
import Table from 'cli-table3';
import type { ResultRow } from '../types/utils.js';
import { formatCell } from '../utils/table.js';

const coolGradient = gradient(['#00F5FF', '#00D4FF', '#00B4FF']);
const successGradient = gradient(['#00ff88', '#00cc77']);
const errorGradient = gradient(['#ff4444', '#cc0000']);

/**
 * Print tabletalk banner.
 */
export function printBanner(): void {
  const banner = `
╔═══════════════════════════════════════╗
║                                       ║
║   ${coolGradient('tabletalk')}                           ║
║   ${chalk.gray('ask your invoices anything')}          ║
║                                       ║
╚═══════════════════════════════════════╝
  `;
  console.log(banner);
}

/**
 * Error message with an optional hint underneath.
 */
export function error(message: string, suggestion?: string): void {
  console.log(`${chalk.red('✖')} ${message}`);
  if (suggestion) {
    console.log(`  ${chalk.yellow('→')} ${chalk.dim(suggestion)}`);
  }
}

export function warn(message: string): void {
  console.log(`${chalk.yellow('⚠')} ${message}`);
}

export function info(message: string): void {
  console.log(`${chalk.blue('ℹ')} ${message}`);
}

/**
 * Create and start a spinner.
 */
export function spinner(text: string): ReturnType<typeof ora> {
  return ora({
    text,
    color: 'cyan',
    spinner: 'dots',
  }).start();
}

export function box(message: string, title?: string): void {
  console.log(
    boxen(message, {
      padding: 1,
      margin: 1,
      borderStyle: 'round',
      borderColor: 'cyan',
      title,
      titleAlignment: 'center',
    })
  );
}

export function successBox(message: string, title?: string): void {
  console.log(
    boxen(successGradient(message), {
      padding: 1,
      margin: 1,
      borderStyle: 'round',
      borderColor: 'green',
      title,
      titleAlignment: 'center',
    })
  );
}

export function errorBox(message: string, title?: string): void {
  console.log(
    boxen(errorGradient(message), {
      padding: 1,
      margin: 1,
      borderStyle: 'round',
      borderColor: 'red',
      title: title || 'Error',
      titleAlignment: 'center',
    })
  );
}

/**
 * Print code block.
 */
export function code(content: string, language?: string): void {
  const border = chalk.gray('─'.repeat(50));
  console.log(border);
  if (language) {
    console.log(chalk.gray(`# ${language}`));
  }
  console.log(chalk.cyan(content));
  console.log(border);
}

/**
 * Print a section header.
 */
export function section(title: string): void {
  console.log('');
  console.log(coolGradient(`▶ ${title}`));
  console.log(chalk.gray('─'.repeat(50)));
}

export function newline(): void {
  console.log('');
}

/**
 * Print a labelled check result.
 */
export function row(label: string, value: string, ok: boolean = true): void {
  const icon = ok ? chalk.green('✔') : chalk.red('✖');
  console.log(`  ${icon} ${chalk.bold(label)}: ${chalk.cyan(value)}`);
}

/**
 * Print result rows as a bordered table, at most `limit` of them.
 */
export function table(columns: readonly string[], rows: readonly ResultRow[], limit = 20): void {
  if (rows.length === 0) {
    console.log(chalk.dim('  (no rows)'));
    return;
  }

  const output = new Table({
    head: columns.map((column) => chalk.bold(column)),
    style: { head: [], border: ['gray'] },
  });
  for (const item of rows.slice(0, limit)) {
    output.push(columns.map((_, index) => formatCell(item[index] ?? null)));
  }
  console.log(output.toString());

  if (rows.length > limit) {
    console.log(chalk.dim(`  … ${rows.length - limit} more row(s)`));
  }
}
