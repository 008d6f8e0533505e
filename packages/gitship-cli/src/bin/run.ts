import { CommanderError } from 'commander';
import { createLogger, errorMessage } from '@gitship/core';
import { runCli } from '../cli';

const log = createLogger('cli');

/**
 * Run the program and turn a thrown error into a non-zero exit
 */
export async function main(args: string[]): Promise<void> {
  try {
    await runCli(args);
  } catch (error) {
    // commander already printed usage errors
    if (!(error instanceof CommanderError)) {
      log.error({ err: error }, 'CLI error occurred');
      process.stderr.write(`Error: ${errorMessage(error)}\n`);
    }
    process.exitCode = 1;
  }
}
