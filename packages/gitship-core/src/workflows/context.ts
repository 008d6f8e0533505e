/**
 * Shared setup for the analyze and deploy workflows
 */

import type { Classification, GitshipConfig } from '@gitship/contracts';
import { classify, resolveSensitiveFiles, type SensitivePolicyOutcome } from '../analyzer/classifier';
import { findRepoRoot } from '../analyzer/git-status';
import { loadIgnoreRules } from '../analyzer/ignore-rules';
import { createPatternMatcher } from '../analyzer/pattern-matcher';
import { appendIgnoreEntries } from '../applier/ignore-file';
import type { ConfirmFunction, PatternMatcher } from '../types';
import { loadGitshipConfig } from '../utils/config';

export interface WorkflowOptions {
  /** Directory the command was started in */
  cwd: string;
  /** Skips loading gitship.config.json and the environment */
  config?: GitshipConfig;
  /** Whether the operator can answer a confirmation */
  interactive: boolean;
  confirm: ConfirmFunction;
  /** Progress callback for UI updates (updates spinner text) */
  onProgress?: (message: string) => void;
}

export interface WorkflowContext {
  repoRoot: string;
  config: GitshipConfig;
  matcher: PatternMatcher;
  warnings: string[];
}

export async function createWorkflowContext(options: WorkflowOptions): Promise<WorkflowContext> {
  const repoRoot = await findRepoRoot(options.cwd);
  const config = options.config ?? (await loadGitshipConfig(repoRoot));

  options.onProgress?.('Loading ignore rules...');
  const { rules, warnings } = await loadIgnoreRules(repoRoot);
  const matcher = createPatternMatcher({ rules, cwd: repoRoot });

  return { repoRoot, config, matcher, warnings: [...warnings] };
}

export interface ClassifiedChanges {
  classification: Classification;
  policy: SensitivePolicyOutcome;
}

/**
 * Classify paths and apply the sensitive-file policy
 */
export async function classifyChanges(
  context: WorkflowContext,
  paths: readonly string[],
  options: Pick<WorkflowOptions, 'interactive' | 'confirm'>
): Promise<ClassifiedChanges> {
  const classification = classify(paths, context.matcher);
  const policy = await resolveSensitiveFiles(classification, {
    interactive: options.interactive,
    confirm: options.confirm,
    appendToIgnoreFile: async (entries) => {
      await appendIgnoreEntries(context.repoRoot, entries, { file: context.config.git.ignoreFile });
    },
  });

  return { classification, policy };
}
