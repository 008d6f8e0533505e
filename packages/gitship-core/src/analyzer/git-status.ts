/**
 * Git status analysis
 */

import { simpleGit, type SimpleGit, type StatusResult } from 'simple-git';
import type { ChangeSet } from '@gitship/contracts';
import { NotARepositoryError, errorMessage } from '../errors';
import { createLogger } from '../utils/logger';

const log = createLogger('git-status');

/**
 * Resolve the repository root for a directory
 */
export async function findRepoRoot(cwd: string): Promise<string> {
  const git: SimpleGit = simpleGit(cwd);

  try {
    const root = (await git.revparse(['--show-toplevel'])).trim();
    if (!root) {
      throw new Error('git returned an empty top-level path');
    }
    return root;
  } catch (error) {
    throw new NotARepositoryError(cwd, error);
  }
}

/**
 * Snapshot working tree changes into four disjoint lists.
 *
 * Status codes are read index-first, worktree-second; the first matching
 * rule wins. Any other entry (type change, unmerged) counts as modified.
 */
export async function getChangeSet(cwd: string): Promise<ChangeSet> {
  const git: SimpleGit = simpleGit(cwd);
  const status: StatusResult = await git.status();

  return buildChangeSet(status.files);
}

/**
 * Map porcelain status entries to a {@link ChangeSet}
 */
export function buildChangeSet(
  files: ReadonlyArray<{ path: string; index: string; working_dir: string }>
): ChangeSet {
  const changes: ChangeSet = { added: [], modified: [], deleted: [], untracked: [] };
  const seen = new Set<string>();

  for (const { path, index, working_dir: worktree } of files) {
    if (!path || seen.has(path)) {
      continue;
    }
    seen.add(path);

    if (index === '?' && worktree === '?') {
      changes.untracked.push(path);
    } else if (index === 'M' || worktree === 'M') {
      changes.modified.push(path);
    } else if (index === 'A' || worktree === 'A' || index === 'R' || index === 'C') {
      changes.added.push(path);
    } else if (index === 'D' || worktree === 'D') {
      changes.deleted.push(path);
    } else if (index.trim() || worktree.trim()) {
      changes.modified.push(path);
    }
  }

  return changes;
}

/**
 * Changed files as the union of unstaged, staged and untracked-not-ignored
 * queries. Any failing query degrades to an empty result.
 */
export async function getChangedFiles(cwd: string): Promise<string[]> {
  const git: SimpleGit = simpleGit(cwd);

  try {
    const modified = await git.raw(['diff', '--name-only']);
    const staged = await git.raw(['diff', '--cached', '--name-only']);
    const untracked = await git.raw(['ls-files', '--others', '--exclude-standard']);

    return [...new Set([...splitLines(modified), ...splitLines(staged), ...splitLines(untracked)])];
  } catch (error) {
    log.error({ cwd }, `Error getting git changes: ${errorMessage(error)}`);
    return [];
  }
}

function splitLines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * All paths of a change set, in list order
 */
export function getAllChangedPaths(changes: ChangeSet): string[] {
  return [...changes.modified, ...changes.added, ...changes.untracked, ...changes.deleted];
}

/**
 * Check if there are any changes
 */
export function hasChanges(changes: ChangeSet): boolean {
  return (
    changes.added.length > 0 ||
    changes.modified.length > 0 ||
    changes.deleted.length > 0 ||
    changes.untracked.length > 0
  );
}

/**
 * Get current branch name
 */
export async function getCurrentBranch(cwd: string): Promise<string> {
  const git: SimpleGit = simpleGit(cwd);

  try {
    const branch = (await git.raw(['branch', '--show-current'])).trim();
    if (branch) {
      return branch;
    }
  } catch (error) {
    log.debug({ cwd }, `branch --show-current failed: ${errorMessage(error)}`);
  }

  // Older git, or detached HEAD
  const ref = await git.revparse(['--abbrev-ref', 'HEAD']);
  return ref.trim();
}

/**
 * Whether the branch already tracks a remote branch
 */
export async function hasUpstream(cwd: string, branch: string): Promise<boolean> {
  const git: SimpleGit = simpleGit(cwd);

  try {
    const upstream = await git.raw(['rev-parse', '--abbrev-ref', `${branch}@{upstream}`]);
    return upstream.trim().length > 0;
  } catch {
    // git exits non-zero when no upstream is configured
    return false;
  }
}

/**
 * Whether a path is still tracked in the index
 */
export async function isTracked(cwd: string, filePath: string): Promise<boolean> {
  const git: SimpleGit = simpleGit(cwd);

  try {
    await git.raw(['ls-files', '--error-unmatch', '--', filePath]);
    return true;
  } catch {
    return false;
  }
}
