/**
 * User confirmation prompt utilities
 */

import * as readline from 'node:readline';
import type { ConfirmFunction } from '../types';

export interface ConfirmOptions {
  /** Answer yes without prompting (for --yes flag) */
  autoConfirm?: boolean;
  input?: NodeJS.ReadableStream & { isTTY?: boolean };
  output?: NodeJS.WritableStream;
}

/**
 * Whether a human can answer a prompt on this input
 */
export function isInteractive(input: { isTTY?: boolean } = process.stdin): boolean {
  return input.isTTY === true;
}

/**
 * Prompt user for yes/no confirmation
 *
 * Only `y` / `yes` confirm. Anything else, including an empty answer, is "no".
 * Input that is not a terminal is treated as "no" without prompting.
 */
export async function promptUserConfirmation(question: string, options: ConfirmOptions = {}): Promise<boolean> {
  const { autoConfirm = false, input = process.stdin, output = process.stdout } = options;

  // Auto-confirm mode (--yes flag)
  if (autoConfirm) {
    output.write(`${question} [auto-confirmed with --yes]\n`);
    return true;
  }

  if (!isInteractive(input)) {
    return false;
  }

  const rl = readline.createInterface({ input, output });

  return new Promise((resolve) => {
    rl.question(`${question} (y/N): `, (answer) => {
      rl.close();
      const normalized = answer.trim().toLowerCase();
      resolve(normalized === 'y' || normalized === 'yes');
    });
  });
}

/**
 * Bind prompt options into the capability the classifier expects
 */
export function createConfirm(options: ConfirmOptions = {}): ConfirmFunction {
  return (question) => promptUserConfirmation(question, options);
}
