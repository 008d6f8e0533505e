/**
 * Path predicates over ignore rules and sensitive patterns
 */

import { isAbsolute, posix } from 'node:path';
import { minimatch } from 'minimatch';
import type { IgnoreRule, PatternMatcher } from '../types';
import { toPosixPath } from './ignore-rules';
import { isSensitiveFile } from './sensitive-patterns';

const MATCH_OPTIONS = { dot: true } as const;

/**
 * Check one absolute, forward-slash path against one rule.
 * A rule also covers everything below a directory it matches.
 */
export function matchesIgnoreRule(absPath: string, rule: IgnoreRule): boolean {
  if (minimatch(absPath, rule.glob, MATCH_OPTIONS) || minimatch(absPath, `${rule.glob}/**`, MATCH_OPTIONS)) {
    return true;
  }

  if (rule.kind === 'recursive') {
    return absPath.startsWith(rule.prefix) && absPath.endsWith(rule.suffix);
  }

  return false;
}

export interface PatternMatcherOptions {
  rules: readonly IgnoreRule[];
  /** Directory relative paths are resolved against (the repository root) */
  cwd: string;
}

/**
 * Build the matcher. Both predicates are pure: no I/O after construction.
 */
export function createPatternMatcher(options: PatternMatcherOptions): PatternMatcher {
  const rules = [...options.rules];
  const cwd = toPosixPath(options.cwd);

  const toAbsolute = (path: string): string => {
    const normalized = toPosixPath(path);
    return isAbsolute(normalized) ? posix.normalize(normalized) : posix.join(cwd, normalized);
  };

  return {
    isIgnored(path: string): boolean {
      const absPath = toAbsolute(path);
      return rules.some((rule) => matchesIgnoreRule(absPath, rule));
    },

    isSensitive(path: string): boolean {
      return isSensitiveFile(path);
    },
  };
}
