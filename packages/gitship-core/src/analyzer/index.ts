/**
 * Working tree analysis: change enumeration, ignore rules and classification
 * @module @gitship/core/analyzer
 */

export {
  findRepoRoot,
  getChangeSet,
  buildChangeSet,
  getChangedFiles,
  getAllChangedPaths,
  hasChanges,
  getCurrentBranch,
  hasUpstream,
  isTracked,
} from './git-status';

export {
  IGNORE_FILE_NAME,
  compileIgnorePattern,
  parseIgnoreFile,
  findIgnoreFiles,
  loadIgnoreRules,
  toPosixPath,
  type LoadIgnoreRulesResult,
} from './ignore-rules';

export { createPatternMatcher, matchesIgnoreRule, type PatternMatcherOptions } from './pattern-matcher';

export {
  SENSITIVE_FILE_PATTERNS,
  SENSITIVE_KEYWORDS,
  isSensitiveFile,
} from './sensitive-patterns';

export {
  classify,
  classifyPath,
  resolveSensitiveFiles,
  type SensitivePolicyOptions,
  type SensitivePolicyOutcome,
} from './classifier';

export { getFileDiff, type FileDiffOptions } from './file-diff';
