/**
 * Terminal output helpers
 *
 * Results go to stdout; errors and warnings to stderr.
 */

import chalk from 'chalk';
import { GitshipError, errorMessage } from '@gitship/core';

export function print(message = ''): void {
  process.stdout.write(`${message}\n`);
}

export function printError(message: string): void {
  process.stderr.write(`${message}\n`);
}

export function printJson(value: unknown): void {
  print(JSON.stringify(value, null, 2));
}

export function formatWarning(message: string): string {
  return chalk.yellow(`⚠ ${message}`);
}

export function formatHeader(text: string): string {
  return chalk.bold(text);
}

export function formatList(items: readonly string[], indent = '  '): string[] {
  return items.map((item) => `${indent}- ${item}`);
}

/**
 * Error message plus its remediation hint, when it has one
 */
export function formatCommandError(error: unknown): string {
  const lines = [chalk.red(`Error: ${errorMessage(error)}`)];
  if (error instanceof GitshipError && error.hint) {
    lines.push(chalk.dim(error.hint));
  }
  return lines.join('\n');
}

/**
 * Sensitive-file banner shown by both commands
 */
export function formatSensitiveFiles(files: readonly string[], maxListed = 10): string[] {
  const lines = [chalk.yellow.bold(`⚠️  ${files.length} potentially sensitive file(s) detected and excluded:`)];
  lines.push(...formatList(files.slice(0, maxListed)).map((line) => chalk.yellow(line)));
  if (files.length > maxListed) {
    lines.push(chalk.yellow(`  ... and ${files.length - maxListed} more files`));
  }
  return lines;
}
