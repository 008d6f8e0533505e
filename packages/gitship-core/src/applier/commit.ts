/**
 * Deployment commit creation
 */

import { simpleGit, type SimpleGit } from 'simple-git';
import type { DeploymentRecord } from '@gitship/contracts';
import { GitCommandError } from '../errors';

export interface CommitMessageInput {
  /** Latest deployment record; omitted when none was read */
  record?: DeploymentRecord;
  branch: string;
  /** Written to the `Automated by:` line */
  automationMarker: string;
  /** Max length of the title part of the summary line */
  summaryMaxLength: number;
  now?: Date;
}

const pad = (n: number): string => String(n).padStart(2, '0');

/**
 * Local time as `YYYY-MM-DD HH:mm:ss`
 */
export function formatLocalTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Shorten to `maxLength` characters, marking the cut with `...`
 */
export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength - 3)}...` : text;
}

/**
 * First line of the commit message
 *
 * @example
 * buildSummaryLine({ id: '42', title: 'Fix login bug', ... }, 72) // 'Deployment 42: Fix login bug'
 */
export function buildSummaryLine(record: DeploymentRecord | undefined, maxLength: number, now: Date = new Date()): string {
  if (!record?.title) {
    return `Automated deployment - ${formatLocalTimestamp(now)}`;
  }

  const title = truncate(record.title, maxLength);
  return record.id ? `Deployment ${record.id}: ${title}` : title;
}

/**
 * Full commit message: summary line, blank line, then metadata
 */
export function buildCommitMessage(input: CommitMessageInput): string {
  const now = input.now ?? new Date();
  const lines = [
    buildSummaryLine(input.record, input.summaryMaxLength, now),
    '',
    `Branch: ${input.branch}`,
    `Automated by: ${input.automationMarker}`,
    `Timestamp: ${now.toISOString()}`,
  ];

  if (input.record) {
    lines.push(`Deployment Log: ${input.record.id}`, '', `Summary: ${input.record.description}`);
  }

  return `${lines.join('\n')}\n`;
}

/**
 * Create a single commit from the index.
 *
 * @returns the new commit sha
 * @throws GitCommandError when git refuses (hook rejection, nothing staged)
 */
export async function createCommit(repoRoot: string, message: string): Promise<string> {
  const git: SimpleGit = simpleGit(repoRoot);

  let sha: string;
  try {
    const result = await git.commit(message);
    sha = result.commit;
  } catch (error) {
    throw new GitCommandError('commit', error);
  }

  if (!sha) {
    throw new GitCommandError('commit', new Error('nothing was committed (is anything staged?)'));
  }

  return sha;
}
