/**
 * Deploy workflow
 * Status → classify → read deployment log → stage → commit → push
 */

import type { DeployOutput, DeploymentRecord } from '@gitship/contracts';
import { getAllChangedPaths, getChangeSet, hasChanges } from '../analyzer/git-status';
import { reconcile, type RunState } from '../applier/reconciler';
import { readLatestDeploymentRecord } from '../deployment/log-reader';
import { classifyChanges, createWorkflowContext, type WorkflowOptions } from './context';

export interface DeployOptions extends WorkflowOptions {
  /** Plan only; no ignore-file edits, no git mutations */
  dryRun?: boolean;
  /** Stop after the commit */
  skipPush?: boolean;
  /** Called after every reconciler transition */
  onTransition?: (state: RunState) => void;
  now?: Date;
}

export interface DeployOutcome {
  /** 1 when sensitive files were found or any stage failed */
  exitCode: 0 | 1;
  output: DeployOutput;
  state?: RunState;
  message?: string;
}

/**
 * @throws DeploymentLogNotFoundError when there are changes but no deployment log
 * @throws NotARepositoryError outside a git working tree
 */
export async function runDeploy(options: DeployOptions): Promise<DeployOutcome> {
  const context = await createWorkflowContext(options);
  const { repoRoot, config } = context;

  options.onProgress?.('Checking git status...');
  const snapshot = await getChangeSet(repoRoot);

  if (!hasChanges(snapshot)) {
    return {
      exitCode: 0,
      message: 'Nothing to deploy',
      output: {
        stage: 'nothing-to-do',
        branch: '',
        classification: { sensitive: [], ignored: [], eligible: [] },
        pushed: false,
        warnings: context.warnings,
      },
    };
  }

  const { classification, policy } = await classifyChanges(context, getAllChangedPaths(snapshot), {
    interactive: options.interactive && !options.dryRun,
    confirm: options.confirm,
  });

  options.onProgress?.('Reading deployment log...');
  const record: DeploymentRecord = await readLatestDeploymentRecord(repoRoot, options.cwd, config.deployment);

  const allowed = new Set(policy.eligible);
  if (policy.addedToIgnoreFile) {
    allowed.add(config.git.ignoreFile);
  }

  const state = await reconcile({
    repoRoot,
    include: (path) => allowed.has(path),
    record,
    remote: config.git.remote,
    summaryMaxLength: config.commit.summaryMaxLength,
    automationMarker: config.commit.automationMarker,
    dryRun: options.dryRun,
    skipPush: options.skipPush,
    now: options.now,
    onTransition: options.onTransition,
  });

  const failed = state.stage === 'failed';

  return {
    exitCode: failed || policy.sensitiveFound ? 1 : 0,
    state,
    message: state.stage === 'nothing-to-do' ? 'Nothing to deploy after filtering' : undefined,
    output: {
      stage: state.stage,
      branch: state.branch,
      deployment: record,
      classification,
      plan: state.plan,
      commitSha: state.commitSha,
      pushed: state.pushed,
      warnings: [...context.warnings, ...state.warnings],
      error: state.error,
    },
  };
}
