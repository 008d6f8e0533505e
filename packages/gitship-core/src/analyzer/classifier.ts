/**
 * Change classification
 *
 * Partitions changed paths into ignored, sensitive and eligible.
 * An ignored path is never re-flagged as sensitive.
 */

import type { Classification, FileClass } from '@gitship/contracts';
import type { ConfirmFunction, PatternMatcher } from '../types';
import { createLogger } from '../utils/logger';

const log = createLogger('classifier');

/**
 * Class of a single path
 */
export function classifyPath(path: string, matcher: PatternMatcher): FileClass {
  if (matcher.isIgnored(path)) {
    return 'ignored';
  }
  if (matcher.isSensitive(path)) {
    return 'sensitive';
  }
  return 'eligible';
}

/**
 * Partition paths; each input path lands in exactly one list, in input order
 */
export function classify(paths: readonly string[], matcher: PatternMatcher): Classification {
  const result: Classification = { sensitive: [], ignored: [], eligible: [] };

  for (const path of new Set(paths)) {
    result[classifyPath(path, matcher)].push(path);
  }

  return result;
}

export interface SensitivePolicyOptions {
  /** Whether someone can answer the confirmation */
  interactive: boolean;
  confirm: ConfirmFunction;
  /** Appends paths to the ignore-rule file */
  appendToIgnoreFile: (paths: string[]) => Promise<void>;
}

export interface SensitivePolicyOutcome {
  /** Paths left for further processing; never contains a sensitive path */
  eligible: string[];
  sensitiveFound: boolean;
  addedToIgnoreFile: boolean;
}

/**
 * Apply the sensitive-file policy.
 *
 * Interactive sessions are offered to append the sensitive paths to the ignore
 * file. In every session the sensitive paths are excluded from what follows;
 * callers turn `sensitiveFound` into a non-zero exit.
 */
export async function resolveSensitiveFiles(
  classification: Classification,
  options: SensitivePolicyOptions
): Promise<SensitivePolicyOutcome> {
  const { sensitive, eligible } = classification;

  if (sensitive.length === 0) {
    return { eligible: [...eligible], sensitiveFound: false, addedToIgnoreFile: false };
  }

  let addedToIgnoreFile = false;

  if (options.interactive) {
    const accepted = await options.confirm(`Add ${sensitive.length} sensitive file(s) to .gitignore?`);
    if (accepted) {
      await options.appendToIgnoreFile([...sensitive]);
      addedToIgnoreFile = true;
      log.info({ count: sensitive.length }, 'Added sensitive files to ignore file');
    }
  } else {
    log.warn({ count: sensitive.length }, 'Non-interactive mode: excluding sensitive files');
  }

  const excluded = new Set(sensitive);

  return {
    eligible: eligible.filter((path) => !excluded.has(path)),
    sensitiveFound: true,
    addedToIgnoreFile,
  };
}
