/**
 * Deployment log discovery and parsing
 *
 * Logs are produced by an external generator as `Deployment_*.txt` files
 * with `Label: value` lines. They are only ever read.
 */

import { existsSync, statSync } from 'node:fs';
import { readFile, stat } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { glob } from 'glob';
import { defaultGitshipConfig, type DeploymentConfig, type DeploymentRecord } from '@gitship/contracts';
import { DeploymentLogNotFoundError } from '../errors';
import { createLogger } from '../utils/logger';

const log = createLogger('deployment-log');

type RecordField = Exclude<keyof DeploymentRecord, 'sourcePath'>;

/**
 * Recognized labels, matched at the start of a line
 */
export const DEPLOYMENT_LOG_LABELS: ReadonlyArray<readonly [label: string, field: RecordField]> = [
  ['Deployment Number:', 'id'],
  ['Deployment Date:', 'date'],
  ['Deployed By:', 'author'],
  ['Title:', 'title'],
  ['Description:', 'description'],
];

/**
 * Candidate log directories, in probe order: repo root, cwd, then cwd's parent
 */
export function candidateLogDirs(
  repoRoot: string,
  cwd: string,
  directoryNames: readonly string[] = defaultGitshipConfig.deployment.directoryNames
): string[] {
  const roots = [repoRoot, cwd, dirname(cwd)];
  const candidates: string[] = [];

  for (const root of roots) {
    for (const name of directoryNames) {
      const candidate = join(root, name);
      if (!candidates.includes(candidate)) {
        candidates.push(candidate);
      }
    }
  }

  return candidates;
}

/**
 * First existing log directory, or undefined
 */
export function findDeploymentLogsDir(
  repoRoot: string,
  cwd: string,
  directoryNames?: readonly string[]
): string | undefined {
  return candidateLogDirs(repoRoot, cwd, directoryNames).find(
    (dir) => existsSync(dir) && statSync(dir).isDirectory()
  );
}

/**
 * Most recently modified log file in a directory, or undefined when empty.
 * Ties resolve to whichever maximum is seen first.
 */
export async function findLatestDeploymentLog(
  dir: string,
  filePattern: string = defaultGitshipConfig.deployment.filePattern
): Promise<string | undefined> {
  const files = await glob(filePattern, { cwd: dir, absolute: true, nodir: true });

  let latest: { path: string; mtimeMs: number } | undefined;
  for (const file of files) {
    const { mtimeMs } = await stat(file);
    if (!latest || mtimeMs > latest.mtimeMs) {
      latest = { path: file, mtimeMs };
    }
  }

  return latest?.path;
}

/**
 * Parse log text into a record. Unknown lines are ignored; missing fields stay empty.
 */
export function parseDeploymentLog(content: string, sourcePath = ''): DeploymentRecord {
  const record: DeploymentRecord = {
    id: '',
    date: '',
    author: '',
    title: '',
    description: '',
    sourcePath,
  };

  for (const line of content.split(/\r?\n/)) {
    const match = DEPLOYMENT_LOG_LABELS.find(([label]) => line.startsWith(label));
    if (match) {
      const [, field] = match;
      record[field] = line.slice(line.indexOf(':') + 1).trim();
    }
  }

  return Object.freeze(record);
}

/**
 * Locate, read and parse the latest deployment log.
 *
 * @throws DeploymentLogNotFoundError when no log directory or log file exists
 */
export async function readLatestDeploymentRecord(
  repoRoot: string,
  cwd: string,
  config: DeploymentConfig = defaultGitshipConfig.deployment
): Promise<DeploymentRecord> {
  const dir = findDeploymentLogsDir(repoRoot, cwd, config.directoryNames);

  if (!dir) {
    throw new DeploymentLogNotFoundError(
      'Deployment logs directory not found',
      candidateLogDirs(repoRoot, cwd, config.directoryNames)
    );
  }

  const file = await findLatestDeploymentLog(dir, config.filePattern);

  if (!file) {
    throw new DeploymentLogNotFoundError(`No deployment files found in ${dir}`, [join(dir, config.filePattern)]);
  }

  log.debug({ file }, 'Reading deployment log');
  const content = await readFile(file, 'utf-8');

  return parseDeploymentLog(content, file);
}
