/**
 * Git push operations
 */

import { simpleGit, type SimpleGit } from 'simple-git';
import type { PushPlan, PushResult } from '@gitship/contracts';
import type { PushOptions } from '../types';
import { hasUpstream } from '../analyzer/git-status';
import { errorMessage } from '../errors';

/**
 * Decide between a plain push and one that establishes upstream tracking
 */
export async function resolvePushPlan(cwd: string, branch: string, options?: PushOptions): Promise<PushPlan> {
  const remote = options?.remote || 'origin';
  const tracked = await hasUpstream(cwd, branch);

  return { remote, branch, setUpstream: !tracked };
}

/**
 * Push the current branch.
 *
 * A branch without upstream is pushed with `--set-upstream <remote> <branch>`;
 * otherwise a plain `git push` is used. Failure is returned, not thrown: the
 * local commit already exists and the push can be retried by hand.
 */
export async function pushCommits(cwd: string, plan: PushPlan): Promise<PushResult> {
  const git: SimpleGit = simpleGit(cwd);
  const { remote, branch, setUpstream } = plan;

  try {
    if (setUpstream) {
      await git.push(remote, branch, ['--set-upstream']);
    } else {
      await git.push();
    }

    return { success: true, remote, branch, setUpstream };
  } catch (error) {
    return {
      success: false,
      remote,
      branch,
      setUpstream,
      error: errorMessage(error),
    };
  }
}
