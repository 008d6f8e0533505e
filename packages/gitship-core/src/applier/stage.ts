/**
 * Staging of working tree changes
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { simpleGit, type SimpleGit } from 'simple-git';
import type { ChangeSet } from '@gitship/contracts';
import { isTracked } from '../analyzer/git-status';
import { GitCommandError } from '../errors';
import { createLogger } from '../utils/logger';

const log = createLogger('stage');

export interface StagePlan {
  /** Paths to `git add` */
  stage: string[];
  /** Deleted paths still tracked in the index, to `git rm --cached` */
  remove: string[];
  /** Paths that no longer exist on disk */
  skipped: string[];
}

/**
 * Decide what to stage without touching the index
 */
export async function buildStagePlan(repoRoot: string, changes: ChangeSet): Promise<StagePlan> {
  const plan: StagePlan = { stage: [], remove: [], skipped: [] };

  for (const file of [...changes.modified, ...changes.added, ...changes.untracked]) {
    if (existsSync(join(repoRoot, file))) {
      plan.stage.push(file);
    } else {
      plan.skipped.push(file);
    }
  }

  for (const file of changes.deleted) {
    if (await isTracked(repoRoot, file)) {
      plan.remove.push(file);
    }
  }

  return plan;
}

/**
 * Apply a stage plan. Existence is checked again right before each add,
 * since a file can vanish after planning; such files move to `skipped`.
 *
 * @throws GitCommandError when git add or git rm fails
 */
export async function applyStagePlan(repoRoot: string, plan: StagePlan): Promise<StagePlan> {
  const git: SimpleGit = simpleGit(repoRoot);
  const applied: StagePlan = { stage: [], remove: [], skipped: [...plan.skipped] };

  for (const file of plan.stage) {
    if (!existsSync(join(repoRoot, file))) {
      log.warn({ file }, `Skipping non-existent file: ${file}`);
      applied.skipped.push(file);
      continue;
    }

    try {
      await git.add(file);
    } catch (error) {
      throw new GitCommandError(`add ${file}`, error);
    }
    applied.stage.push(file);
  }

  for (const file of plan.remove) {
    try {
      await git.rmKeepLocal(file);
    } catch (error) {
      throw new GitCommandError(`rm --cached ${file}`, error);
    }
    applied.remove.push(file);
  }

  return applied;
}
