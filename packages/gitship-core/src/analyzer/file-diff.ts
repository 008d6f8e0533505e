/**
 * Per-file diff extraction for sample diffs
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { simpleGit, type SimpleGit } from 'simple-git';
import { errorMessage } from '../errors';

export interface FileDiffOptions {
  /** Characters of an untracked file shown as its "diff" */
  previewChars?: number;
}

/**
 * Get the diff for a single file.
 *
 * Tracked files diff against HEAD, falling back to the staged diff.
 * Untracked files show the start of their content.
 * Failures come back as a string starting with `Error`; callers drop those.
 */
export async function getFileDiff(cwd: string, filePath: string, options: FileDiffOptions = {}): Promise<string> {
  const { previewChars = 1000 } = options;
  const git: SimpleGit = simpleGit(cwd);

  try {
    const tracked = (await git.raw(['ls-files', '--', filePath])).trim();

    if (tracked) {
      const diff = await git.diff(['HEAD', '--', filePath]);
      if (diff) {
        return diff;
      }
      return await git.diff(['--cached', '--', filePath]);
    }

    return await previewUntrackedFile(join(cwd, filePath), filePath, previewChars);
  } catch (error) {
    return `Error getting diff for ${filePath}: ${errorMessage(error)}`;
  }
}

async function readPrefix(absPath: string, length: number): Promise<{ content: string; truncated: boolean }> {
  // Code points, so a multi-byte character is never cut in half
  const chars = Array.from(await readFile(absPath, 'utf-8'));
  return {
    content: chars.slice(0, length).join(''),
    truncated: chars.length > length,
  };
}

async function previewUntrackedFile(absPath: string, filePath: string, previewChars: number): Promise<string> {
  const unreadable = `New file: ${filePath} (binary or unreadable)`;
  const preview = await readPrefix(absPath, previewChars).catch(() => null);

  if (!preview || preview.content.includes('\u0000')) {
    return unreadable;
  }

  const diff = `New file: ${filePath}\n\n${preview.content}`;
  return preview.truncated ? `${diff}...` : diff;
}
