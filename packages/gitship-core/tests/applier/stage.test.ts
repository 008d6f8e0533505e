/**
 * Tests for stage.ts - stage planning and application
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import { applyStagePlan, buildStagePlan } from '../../src/applier/stage';
import { GitCommandError } from '../../src/errors';
import { createFakeGit, installFakeGit, type FakeGit } from '../helpers/fake-git';
import { createTempDir, removeTempDir, writeFiles } from '../helpers/temp-dir';

vi.mock('simple-git', () => ({ simpleGit: vi.fn() }));

describe('stage', () => {
  let root: string;
  let fake: FakeGit;

  const changes = {
    modified: ['app.py'],
    added: ['vanished.ts'],
    untracked: ['new.txt'],
    deleted: ['gone.txt', 'never-tracked.txt'],
  };

  beforeEach(async () => {
    root = await createTempDir();
    fake = createFakeGit({ root, tracked: ['gone.txt'] });
    installFakeGit(fake);
    await writeFiles(root, { 'app.py': 'print(1)\n', 'new.txt': 'hello\n' });
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('plans adds, removals and skips', async () => {
    await expect(buildStagePlan(root, changes)).resolves.toEqual({
      stage: ['app.py', 'new.txt'],
      remove: ['gone.txt'],
      skipped: ['vanished.ts'],
    });
  });

  it('skips a file deleted after planning instead of failing', async () => {
    const plan = await buildStagePlan(root, changes);
    await rm(join(root, 'new.txt'));

    const applied = await applyStagePlan(root, plan);

    expect(applied).toEqual({ stage: ['app.py'], remove: ['gone.txt'], skipped: ['vanished.ts', 'new.txt'] });
    expect(fake.callsTo('add')).toEqual([['app.py']]);
    expect(fake.callsTo('rmKeepLocal')).toEqual([['gone.txt']]);
  });

  it('fails when git add fails', async () => {
    fake.state.addError = new Error('index.lock exists');
    const plan = await buildStagePlan(root, changes);

    await expect(applyStagePlan(root, plan)).rejects.toBeInstanceOf(GitCommandError);
  });
});
