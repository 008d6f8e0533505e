/**
 * Core types for gitship
 *
 * Note: Zod schemas and inferred types are in @gitship/contracts.
 * This file contains internal types used within gitship-core.
 */

// Re-export types from contracts for convenience
export type {
  ChangeSet,
  Classification,
  FileClass,
  DeploymentRecord,
  CommitPlan,
  PushPlan,
  PushResult,
  RunStage,
  AnalysisArtifact,
  AnalysisDetails,
  SecurityWarning,
  GitshipConfig,
} from '@gitship/contracts';

/**
 * Asks the operator a yes/no question.
 * Implementations for non-interactive sessions resolve to false.
 */
export type ConfirmFunction = (question: string) => Promise<boolean>;

/**
 * Compiled ignore rule.
 *
 * `anchored` rules came from a pattern with a leading `/` and only match
 * relative to the directory of their ignore file. `recursive` rules match
 * at any depth below it; `prefix`/`suffix` are the halves around `**`.
 */
export type IgnoreRule =
  | {
      kind: 'anchored';
      glob: string;
      baseDir: string;
      source: string;
    }
  | {
      kind: 'recursive';
      glob: string;
      prefix: string;
      suffix: string;
      baseDir: string;
      source: string;
    };

/**
 * Read-only predicates over loaded ignore rules and the fixed sensitive patterns
 */
export interface PatternMatcher {
  isIgnored(path: string): boolean;
  isSensitive(path: string): boolean;
}

/**
 * Options for pushing commits
 */
export interface PushOptions {
  /** Remote name used when establishing upstream (default: origin) */
  remote?: string;
}
