import { Command } from 'commander';
import chalk from 'chalk';
import { createAnalyzeCommand } from './commands/analyze';
import { createDeployCommand } from './commands/deploy';

const VERSION = '0.1.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('gitship')
    .description('Classify working tree changes and commit them with a deployment log summary')
    .version(VERSION, '-v, --version', 'Output the current version')
    .configureOutput({
      writeErr: (str) => process.stderr.write(chalk.red(str)),
    });

  program.exitOverride();

  // addCommand does not inherit exitOverride or output settings
  for (const command of [createAnalyzeCommand(), createDeployCommand()]) {
    program.addCommand(command.copyInheritedSettings(program));
  }

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws on --help and --version
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' || error.code === 'commander.version')
    ) {
      return;
    }

    throw error;
  }
}

export { createAnalyzeCommand, createDeployCommand, executeAnalyze, executeDeploy } from './commands';
