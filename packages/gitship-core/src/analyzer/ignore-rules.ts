/**
 * Ignore-rule loading
 *
 * Discovers every `.gitignore` below the repository root and compiles its
 * lines into {@link IgnoreRule}s anchored to the file's directory.
 */

import { readFile } from 'node:fs/promises';
import { dirname, posix } from 'node:path';
import { glob } from 'glob';
import { errorMessage } from '../errors';
import type { IgnoreRule } from '../types';
import { createLogger } from '../utils/logger';

const log = createLogger('ignore-rules');

export const IGNORE_FILE_NAME = '.gitignore';

/**
 * Directories never searched for ignore files
 */
const WALK_EXCLUDES = ['**/.git/**', '**/node_modules/**'];

/**
 * Normalize to forward slashes and drop a trailing separator
 */
export function toPosixPath(path: string): string {
  const normalized = path.replace(/\\/g, '/');
  return normalized.length > 1 ? normalized.replace(/\/+$/, '') : normalized;
}

/**
 * Compile one ignore-file line.
 *
 * @example
 * compileIgnorePattern('/dist', '/repo')    // anchored: /repo/dist
 * compileIgnorePattern('*.log', '/repo/app') // recursive: /repo/app/**\/*.log
 */
export function compileIgnorePattern(line: string, baseDir: string): IgnoreRule {
  const base = toPosixPath(baseDir);
  const source = line;
  // Directory patterns (`build/`) match the directory path itself
  const pattern = line.length > 1 ? line.replace(/\/+$/, '') : line;

  if (pattern.startsWith('/')) {
    return {
      kind: 'anchored',
      glob: posix.join(base, pattern.slice(1)),
      baseDir: base,
      source,
    };
  }

  return {
    kind: 'recursive',
    glob: posix.join(base, '**', pattern),
    prefix: base.endsWith('/') ? base : `${base}/`,
    suffix: `/${pattern}`,
    baseDir: base,
    source,
  };
}

/**
 * Parse the contents of one ignore file.
 * Blank lines, `#` comments and `!` negations are skipped.
 */
export function parseIgnoreFile(content: string, baseDir: string): IgnoreRule[] {
  const rules: IgnoreRule[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();

    if (!line || line.startsWith('#')) {
      continue;
    }

    // A negation never adds an ignore; under OR semantics it cannot remove one either
    if (line.startsWith('!')) {
      log.debug({ line, baseDir }, 'Skipping negated ignore pattern');
      continue;
    }

    rules.push(compileIgnorePattern(line, baseDir));
  }

  return rules;
}

/**
 * Find ignore files below the root, shallowest first
 */
export async function findIgnoreFiles(repoRoot: string): Promise<string[]> {
  const files = await glob(`**/${IGNORE_FILE_NAME}`, {
    cwd: repoRoot,
    dot: true,
    absolute: true,
    nodir: true,
    ignore: WALK_EXCLUDES,
  });

  return files
    .map(toPosixPath)
    .sort((a, b) => a.split('/').length - b.split('/').length || a.localeCompare(b));
}

export interface LoadIgnoreRulesResult {
  rules: readonly IgnoreRule[];
  /** Ignore files that could not be read */
  warnings: string[];
}

/**
 * Load all ignore rules in the repository.
 * An unreadable file is logged and skipped; loading continues.
 */
export async function loadIgnoreRules(repoRoot: string): Promise<LoadIgnoreRulesResult> {
  const rules: IgnoreRule[] = [];
  const warnings: string[] = [];

  for (const file of await findIgnoreFiles(repoRoot)) {
    try {
      const content = await readFile(file, 'utf-8');
      rules.push(...parseIgnoreFile(content, dirname(file)));
    } catch (error) {
      const message = `Could not parse ${file}: ${errorMessage(error)}`;
      log.warn({ file }, message);
      warnings.push(message);
    }
  }

  log.debug({ count: rules.length }, 'Loaded ignore rules');

  return { rules: Object.freeze(rules), warnings };
}
