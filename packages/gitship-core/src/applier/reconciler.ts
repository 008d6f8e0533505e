/**
 * Repository reconciliation
 *
 * Moves a working tree through
 * `idle → status-checked → staged → committed → pushed`.
 * Any stage can end in `failed`; `status-checked` can end in `nothing-to-do`.
 * Each step returns a new frozen {@link RunState}; nothing is retried or rolled back.
 */

import type { ChangeSet, CommitPlan, DeploymentRecord, RunStage } from '@gitship/contracts';
import { getChangeSet, getCurrentBranch, hasChanges } from '../analyzer/git-status';
import { errorMessage } from '../errors';
import { createLogger } from '../utils/logger';
import { buildCommitMessage, createCommit } from './commit';
import { pushCommits, resolvePushPlan } from './push';
import { applyStagePlan, buildStagePlan } from './stage';

const log = createLogger('reconciler');

export interface RunState {
  readonly stage: RunStage;
  readonly repoRoot: string;
  readonly branch: string;
  readonly changes: ChangeSet;
  readonly plan?: CommitPlan;
  readonly commitSha?: string;
  readonly pushed: boolean;
  readonly warnings: readonly string[];
  /** Stage that failed, when `stage` is `failed` */
  readonly failedAt?: RunStage;
  readonly error?: string;
}

const EMPTY_CHANGES: ChangeSet = { added: [], modified: [], deleted: [], untracked: [] };

function advance(state: RunState, patch: Partial<RunState>): RunState {
  return Object.freeze({ ...state, ...patch });
}

function fail(state: RunState, error: unknown): RunState {
  const message = errorMessage(error);
  log.error({ stage: state.stage }, message);
  return advance(state, { stage: 'failed', failedAt: state.stage, error: message });
}

function expectStage(state: RunState, expected: RunStage): boolean {
  return state.stage === expected;
}

export function createRunState(repoRoot: string): RunState {
  const state: RunState = {
    stage: 'idle',
    repoRoot,
    branch: '',
    changes: EMPTY_CHANGES,
    pushed: false,
    warnings: [],
  };
  return Object.freeze(state);
}

/**
 * Keep only paths accepted by `include`
 */
export function filterChangeSet(changes: ChangeSet, include: (path: string) => boolean): ChangeSet {
  return {
    added: changes.added.filter(include),
    modified: changes.modified.filter(include),
    deleted: changes.deleted.filter(include),
    untracked: changes.untracked.filter(include),
  };
}

export interface CheckStatusOptions {
  /** Paths rejected here are left out of the run (ignored or sensitive files) */
  include?: (path: string) => boolean;
}

/**
 * idle → status-checked | nothing-to-do
 */
export async function checkStatus(state: RunState, options: CheckStatusOptions = {}): Promise<RunState> {
  if (!expectStage(state, 'idle')) {
    return state;
  }

  try {
    const branch = await getCurrentBranch(state.repoRoot);
    const snapshot = await getChangeSet(state.repoRoot);
    const changes = options.include ? filterChangeSet(snapshot, options.include) : snapshot;

    if (!hasChanges(changes)) {
      return advance(state, { stage: 'nothing-to-do', branch, changes });
    }

    return advance(state, { stage: 'status-checked', branch, changes });
  } catch (error) {
    return fail(state, error);
  }
}

export interface PlanCommitOptions {
  record?: DeploymentRecord;
  remote: string;
  summaryMaxLength: number;
  automationMarker: string;
  now?: Date;
}

/**
 * Attach the commit plan to a status-checked run. Read-only.
 */
export async function planCommit(state: RunState, options: PlanCommitOptions): Promise<RunState> {
  if (!expectStage(state, 'status-checked')) {
    return state;
  }

  try {
    const stagePlan = await buildStagePlan(state.repoRoot, state.changes);
    const push = await resolvePushPlan(state.repoRoot, state.branch, { remote: options.remote });
    const message = buildCommitMessage({
      record: options.record,
      branch: state.branch,
      automationMarker: options.automationMarker,
      summaryMaxLength: options.summaryMaxLength,
      now: options.now,
    });

    const plan: CommitPlan = { ...stagePlan, message, push };
    const warnings = stagePlan.skipped.map((file) => `Skipping non-existent file: ${file}`);

    return advance(state, { plan, warnings: [...state.warnings, ...warnings] });
  } catch (error) {
    return fail(state, error);
  }
}

/**
 * status-checked → staged
 */
export async function stageChanges(state: RunState): Promise<RunState> {
  if (!expectStage(state, 'status-checked') || !state.plan) {
    return state;
  }

  const { plan } = state;

  try {
    const applied = await applyStagePlan(state.repoRoot, plan);
    const vanished = applied.skipped.filter((file) => !plan.skipped.includes(file));

    return advance(state, {
      stage: 'staged',
      plan: { ...plan, ...applied },
      warnings: [...state.warnings, ...vanished.map((file) => `Skipping non-existent file: ${file}`)],
    });
  } catch (error) {
    return fail(state, error);
  }
}

/**
 * staged → committed
 */
export async function commitChanges(state: RunState): Promise<RunState> {
  if (!expectStage(state, 'staged') || !state.plan) {
    return state;
  }

  try {
    const commitSha = await createCommit(state.repoRoot, state.plan.message);
    return advance(state, { stage: 'committed', commitSha });
  } catch (error) {
    return fail(state, error);
  }
}

/**
 * committed → pushed. A failed push keeps `commitSha`: the commit stays.
 */
export async function pushChanges(state: RunState): Promise<RunState> {
  if (!expectStage(state, 'committed') || !state.plan?.push) {
    return state;
  }

  const result = await pushCommits(state.repoRoot, state.plan.push);

  if (!result.success) {
    return fail(state, `Push failed: ${result.error ?? 'unknown error'}. You can manually push with: git push`);
  }

  return advance(state, { stage: 'pushed', pushed: true });
}

export interface ReconcileOptions extends PlanCommitOptions, CheckStatusOptions {
  repoRoot: string;
  /** Build the plan but leave the repository untouched */
  dryRun?: boolean;
  /** Stop after the commit */
  skipPush?: boolean;
  /** Called after every transition, for progress display */
  onTransition?: (state: RunState) => void;
}

/**
 * Run the whole pipeline once
 */
export async function reconcile(options: ReconcileOptions): Promise<RunState> {
  const notify = (state: RunState): RunState => {
    options.onTransition?.(state);
    return state;
  };

  let state = notify(await checkStatus(createRunState(options.repoRoot), options));
  if (state.stage !== 'status-checked') {
    return state;
  }

  state = await planCommit(state, options);
  if (options.dryRun || state.stage === 'failed') {
    return notify(state);
  }

  state = notify(await stageChanges(state));
  if (state.stage === 'failed') {
    return state;
  }

  state = notify(await commitChanges(state));
  if (state.stage === 'failed' || options.skipPush) {
    return state;
  }

  return notify(await pushChanges(state));
}
