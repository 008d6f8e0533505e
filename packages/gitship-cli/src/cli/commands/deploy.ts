/**
 * deploy command
 * Status → classify → read deployment log → stage → commit → push
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { runDeploy, type DeployOutcome, type RunState } from '@gitship/core';
import { applyFlags, deployFlags, type DeployFlags } from './flags';
import { createSpinnerConfirm } from './confirm';
import { formatCommandError, formatHeader, formatSensitiveFiles, formatWarning, print, printError, printJson } from '../output';

const STAGE_MESSAGES: Partial<Record<RunState['stage'], string>> = {
  'status-checked': 'Changes collected',
  staged: 'Changes staged',
  committed: 'Commit created',
  pushed: 'Pushed',
};

export function createDeployCommand(): Command {
  const command = new Command('deploy').description(
    'Commit eligible changes with a message from the latest deployment log, then push'
  );

  applyFlags(command, deployFlags).action(async (flags: DeployFlags) => {
    process.exitCode = await executeDeploy(flags);
  });

  return command;
}

/**
 * Run the deploy workflow and render its outcome
 *
 * @returns process exit code
 */
export async function executeDeploy(flags: DeployFlags, cwd: string = process.cwd()): Promise<number> {
  const json = flags.json ?? false;
  const dryRun = flags.dryRun ?? false;
  const spinner = ora({ text: 'Checking git status...', isSilent: json }).start();
  const { interactive, confirm } = createSpinnerConfirm(spinner, flags.yes ?? false);

  let outcome: DeployOutcome;
  try {
    outcome = await runDeploy({
      cwd,
      interactive,
      confirm,
      dryRun,
      skipPush: flags.push === false,
      onProgress: (message) => {
        spinner.text = message;
      },
      onTransition: (state) => {
        const message = STAGE_MESSAGES[state.stage];
        if (message && !dryRun) {
          spinner.text = message;
        }
      },
    });
  } catch (error) {
    spinner.fail('Deploy failed');
    printError(formatCommandError(error));
    return 1;
  }

  const { output } = outcome;

  if (output.stage === 'failed') {
    spinner.fail(output.error ?? 'Deploy failed');
  } else if (outcome.message) {
    spinner.info(outcome.message);
  } else if (dryRun) {
    spinner.succeed('Commit plan ready (dry run)');
  } else {
    spinner.succeed(output.pushed ? 'Deployed' : 'Committed');
  }

  if (json) {
    printJson(output);
  } else {
    renderDeploy(outcome, dryRun);
  }

  return outcome.exitCode;
}

function renderDeploy({ output }: DeployOutcome, dryRun: boolean): void {
  for (const warning of output.warnings) {
    printError(formatWarning(warning));
  }

  if (output.classification.sensitive.length > 0) {
    for (const line of formatSensitiveFiles(output.classification.sensitive)) {
      printError(line);
    }
  }

  if (output.deployment?.id) {
    print(chalk.dim(`Deployment log: ${output.deployment.id}`));
  }

  const { plan } = output;
  if (plan && dryRun) {
    print();
    print(formatHeader('Commit plan (dry run):'));
    print(`  Stage: ${plan.stage.length} file(s)`);
    print(`  Remove: ${plan.remove.length} file(s)`);
    if (plan.push) {
      const upstream = plan.push.setUpstream ? ' (set upstream)' : '';
      print(`  Push: ${plan.push.remote}/${plan.push.branch}${upstream}`);
    }
    print();
    print(plan.message.trimEnd());
    return;
  }

  if (output.commitSha) {
    const firstLine = plan?.message.split('\n')[0] ?? '';
    print(`  ${chalk.dim(`[${output.commitSha.substring(0, 7)}]`)} ${firstLine}`);
  }
  if (output.pushed) {
    print(chalk.green(`Pushed to ${plan?.push?.remote ?? 'origin'}/${output.branch}`));
  }
  if (output.stage === 'failed' && output.error) {
    printError(chalk.red(output.error));
  }
}
