/**
 * Repository mutation: staging, commit, push and ignore-file patching
 * @module @gitship/core/applier
 */

export { buildStagePlan, applyStagePlan, type StagePlan } from './stage';

export {
  buildCommitMessage,
  buildSummaryLine,
  createCommit,
  formatLocalTimestamp,
  truncate,
  type CommitMessageInput,
} from './commit';

export { pushCommits, resolvePushPlan } from './push';

export { appendIgnoreEntries, type AppendIgnoreOptions } from './ignore-file';

export {
  createRunState,
  filterChangeSet,
  checkStatus,
  planCommit,
  stageChanges,
  commitChanges,
  pushChanges,
  reconcile,
  type RunState,
  type CheckStatusOptions,
  type PlanCommitOptions,
  type ReconcileOptions,
} from './reconciler';
