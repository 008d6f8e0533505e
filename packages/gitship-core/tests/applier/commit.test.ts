/**
 * Tests for commit.ts - commit message and commit creation
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { DeploymentRecord } from '@gitship/contracts';
import {
  buildCommitMessage,
  buildSummaryLine,
  createCommit,
  formatLocalTimestamp,
  truncate,
} from '../../src/applier/commit';
import { GitCommandError } from '../../src/errors';
import { createFakeGit, installFakeGit, type FakeGit } from '../helpers/fake-git';

vi.mock('simple-git', () => ({ simpleGit: vi.fn() }));

const RECORD: DeploymentRecord = {
  id: '42',
  date: '2024-05-01',
  author: 'dana',
  title: 'Fix login bug',
  description: 'Resolve session timeout on refresh',
  sourcePath: '/repo/DeploymentLogs/Deployment_42.txt',
};

describe('buildSummaryLine', () => {
  it('combines deployment number and title', () => {
    expect(buildSummaryLine(RECORD, 72)).toBe('Deployment 42: Fix login bug');
  });

  it('uses the title alone without a deployment number', () => {
    expect(buildSummaryLine({ ...RECORD, id: '' }, 72)).toBe('Fix login bug');
  });

  it('truncates long titles', () => {
    expect(buildSummaryLine({ ...RECORD, title: 'Rework the entire checkout flow' }, 12)).toBe(
      'Deployment 42: Rework th...'
    );
  });

  it('falls back to a timestamp without a title', () => {
    const now = new Date(2024, 4, 1, 9, 5, 3);
    expect(buildSummaryLine(undefined, 72, now)).toBe('Automated deployment - 2024-05-01 09:05:03');
    expect(buildSummaryLine({ ...RECORD, title: '' }, 72, now)).toBe('Automated deployment - 2024-05-01 09:05:03');
  });
});

describe('truncate and formatLocalTimestamp', () => {
  it('truncate marks the cut', () => {
    expect(truncate('abcdefghij', 8)).toBe('abcde...');
    expect(truncate('abc', 8)).toBe('abc');
  });

  it('formatLocalTimestamp pads every field', () => {
    expect(formatLocalTimestamp(new Date(2025, 0, 2, 3, 4, 5))).toBe('2025-01-02 03:04:05');
  });
});

describe('buildCommitMessage', () => {
  const now = new Date('2024-05-01T10:00:00.000Z');

  it('writes summary, metadata and the deployment description', () => {
    expect(
      buildCommitMessage({ record: RECORD, branch: 'main', automationMarker: 'gitship', summaryMaxLength: 72, now })
    ).toBe(
      [
        'Deployment 42: Fix login bug',
        '',
        'Branch: main',
        'Automated by: gitship',
        'Timestamp: 2024-05-01T10:00:00.000Z',
        'Deployment Log: 42',
        '',
        'Summary: Resolve session timeout on refresh',
        '',
      ].join('\n')
    );
  });

  it('omits deployment lines without a record', () => {
    const message = buildCommitMessage({ branch: 'dev', automationMarker: 'ci', summaryMaxLength: 72, now });

    expect(message.split('\n').slice(1)).toEqual([
      '',
      'Branch: dev',
      'Automated by: ci',
      'Timestamp: 2024-05-01T10:00:00.000Z',
      '',
    ]);
  });
});

describe('createCommit', () => {
  let fake: FakeGit;

  beforeEach(() => {
    fake = createFakeGit();
    installFakeGit(fake);
  });

  it('returns the new sha', async () => {
    await expect(createCommit('/repo', 'msg\n')).resolves.toBe('abc1234def5678');
    expect(fake.callsTo('commit')).toEqual([['msg\n']]);
  });

  it('wraps git failures', async () => {
    fake.state.commitError = new Error('hook rejected');

    const error = await createCommit('/repo', 'msg\n').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GitCommandError);
    expect(error).toMatchObject({ code: 'E_GIT', message: 'git commit failed: hook rejected' });
  });

  it('fails when nothing was committed', async () => {
    fake.state.commitSha = '';
    await expect(createCommit('/repo', 'msg\n')).rejects.toBeInstanceOf(GitCommandError);
  });
});
