/**
 * analyze command
 * Enumerate → classify → write prompt and analysis artifacts
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { runAnalyze, type AnalyzeOutcome } from '@gitship/core';
import { analyzeFlags, applyFlags, type AnalyzeFlags } from './flags';
import { createSpinnerConfirm } from './confirm';
import { formatCommandError, formatHeader, formatSensitiveFiles, formatWarning, print, printError, printJson } from '../output';

export function createAnalyzeCommand(): Command {
  const command = new Command('analyze').description(
    'Classify working tree changes and write the analysis prompt and heuristic analysis'
  );

  applyFlags(command, analyzeFlags).action(async (flags: AnalyzeFlags) => {
    process.exitCode = await executeAnalyze(flags);
  });

  return command;
}

/**
 * Run the analyze workflow and render its outcome
 *
 * @returns process exit code
 */
export async function executeAnalyze(flags: AnalyzeFlags, cwd: string = process.cwd()): Promise<number> {
  const json = flags.json ?? false;
  const spinner = ora({ text: 'Analyzing changes...', isSilent: json }).start();
  const { interactive, confirm } = createSpinnerConfirm(spinner, flags.yes ?? false);

  let outcome: AnalyzeOutcome;
  try {
    outcome = await runAnalyze({
      cwd,
      interactive,
      confirm,
      onProgress: (message) => {
        spinner.text = message;
      },
    });
  } catch (error) {
    spinner.fail('Analysis failed');
    printError(formatCommandError(error));
    return 1;
  }

  if (outcome.message) {
    spinner.info(outcome.message);
  } else {
    spinner.succeed(`Analyzed ${outcome.output.changedFiles} changed file(s)`);
  }

  if (json) {
    printJson(outcome.output);
  } else {
    renderAnalyze(outcome);
  }

  return outcome.exitCode;
}

function renderAnalyze({ output, analysis, warnings }: AnalyzeOutcome): void {
  for (const warning of warnings) {
    printError(formatWarning(warning));
  }

  const { sensitive, ignored } = output.classification;
  if (sensitive.length > 0) {
    for (const line of formatSensitiveFiles(sensitive)) {
      printError(line);
    }
    if (output.addedToIgnoreFile) {
      printError(chalk.green('Added them to .gitignore'));
    }
  }
  if (ignored.length > 0) {
    print(chalk.dim(`Skipped ${ignored.length} file(s) already in .gitignore`));
  }

  const categories = Object.entries(output.categories);
  if (categories.length > 0) {
    print();
    print(formatHeader('Changes by category:'));
    for (const [category, files] of categories) {
      print(`  ${category}: ${files.length} file(s)`);
    }
  }

  if (analysis) {
    print();
    print(formatHeader(analysis.title));
    print(analysis.description);
  }

  if (output.promptPath) {
    print();
    print(chalk.dim(`Prompt saved to: ${output.promptPath}`));
  }
  if (output.analysisPath) {
    print(chalk.dim(`Analysis saved to: ${output.analysisPath}`));
  }
}
