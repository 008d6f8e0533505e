/**
 * Ignore-file patching
 */

import { readFile, writeFile } from 'node:fs/promises';
import { isAbsolute, join } from 'node:path';
import { IGNORE_FILE_NAME } from '../analyzer/ignore-rules';

export interface AppendIgnoreOptions {
  /** Ignore file, relative to the repo root (default: .gitignore) */
  file?: string;
  /** Comment line written above the new entries */
  header?: string;
}

async function readIfExists(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return '';
    }
    throw error;
  }
}

/**
 * Append entries under a comment header, skipping ones already listed.
 * Creates the file when missing. Returns the entries actually written.
 */
export async function appendIgnoreEntries(
  repoRoot: string,
  entries: readonly string[],
  options: AppendIgnoreOptions = {}
): Promise<string[]> {
  const { file = IGNORE_FILE_NAME, header = 'Automatically added sensitive files' } = options;
  const path = isAbsolute(file) ? file : join(repoRoot, file);

  let content = await readIfExists(path);
  const existing = new Set(content.split(/\r?\n/).map((line) => line.trim()));
  const added = [...new Set(entries)].filter((entry) => entry.length > 0 && !existing.has(entry));

  if (added.length === 0) {
    return [];
  }

  if (content && !content.endsWith('\n')) {
    content += '\n';
  }
  content += `\n# ${header}\n`;
  content += added.map((entry) => `${entry}\n`).join('');

  await writeFile(path, content, 'utf-8');
  return added;
}
