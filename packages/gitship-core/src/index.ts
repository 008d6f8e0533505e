/**
 * gitship core
 *
 * Change classification, change summaries, deployment log reading and
 * repository reconciliation.
 *
 * @module @gitship/core
 */

// Types
export * from './types';

// Errors
export {
  GitshipError,
  NotARepositoryError,
  DeploymentLogNotFoundError,
  GitCommandError,
  ConfigError,
  errorMessage,
  type GitshipErrorCode,
} from './errors';

// Analyzer
export {
  findRepoRoot,
  getChangeSet,
  getChangedFiles,
  getAllChangedPaths,
  hasChanges,
  getCurrentBranch,
  loadIgnoreRules,
  createPatternMatcher,
  isSensitiveFile,
  classify,
  resolveSensitiveFiles,
  getFileDiff,
} from './analyzer';

// Summarizer
export {
  categorizeFiles,
  buildAnalysisPrompt,
  collectSampleDiffs,
  buildHeuristicAnalysis,
  writePromptArtifact,
  writeAnalysisArtifact,
} from './summarizer';

// Deployment log
export { readLatestDeploymentRecord, parseDeploymentLog, findDeploymentLogsDir } from './deployment';

// Applier
export { appendIgnoreEntries, buildCommitMessage, reconcile, pushCommits, type RunState } from './applier';

// Workflows
export {
  runAnalyze,
  runDeploy,
  type AnalyzeOptions,
  type AnalyzeOutcome,
  type DeployOptions,
  type DeployOutcome,
} from './workflows';

// Utils
export { createLogger, logger, resolveLogLevel, type Logger } from './utils/logger';
export { loadGitshipConfig, readFileConfig } from './utils/config';
export { createConfirm, isInteractive, promptUserConfirmation, type ConfirmOptions } from './utils/prompt';
