/**
 * gitship configuration contract
 *
 * Defines the shape of `gitship.config.json` at the repository root
 * and how environment variables override it.
 */

import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import type { GitshipEnv } from '../env';

/**
 * Git configuration
 */
export interface GitConfig {
  /** Remote used when the branch has no upstream yet (default: origin) */
  remote: string;
  /** Ignore-rule file that sensitive paths are appended to (default: .gitignore) */
  ignoreFile: string;
}

/**
 * Deployment log lookup
 */
export interface DeploymentConfig {
  /** Directory names probed under the repo root, cwd and cwd's parent, in order */
  directoryNames: string[];
  /** Glob for log files inside the chosen directory */
  filePattern: string;
}

/**
 * Commit message settings
 */
export interface CommitConfig {
  /** Max length of the deployment title on the summary line */
  summaryMaxLength: number;
  /** Written to the `Automated by:` line of every commit */
  automationMarker: string;
}

/**
 * Output artifact locations
 */
export interface ArtifactsConfig {
  promptPath: string;
  analysisPath: string;
}

/**
 * Change summary limits
 */
export interface SummaryConfig {
  maxFilesPerCategory: number;
  maxSensitiveListed: number;
  maxSampleDiffs: number;
  maxDiffChars: number;
  /** How many eligible files are considered when collecting sample diffs */
  maxDiffCandidates: number;
  untrackedPreviewChars: number;
}

/**
 * Full configuration
 *
 * @example
 * ```json
 * {
 *   "git": { "remote": "origin" },
 *   "commit": { "summaryMaxLength": 72 },
 *   "artifacts": { "promptPath": "/tmp/deployment_prompt.txt" }
 * }
 * ```
 */
export interface GitshipConfig {
  git: GitConfig;
  deployment: DeploymentConfig;
  commit: CommitConfig;
  artifacts: ArtifactsConfig;
  summary: SummaryConfig;
}

export const CONFIG_FILE_NAME = 'gitship.config.json';

/**
 * Default configuration values
 */
export const defaultGitshipConfig: GitshipConfig = {
  git: {
    remote: 'origin',
    ignoreFile: '.gitignore',
  },
  deployment: {
    directoryNames: [
      'DeploymentLogs',
      'deploymentLogs',
      'deploymentlogs',
      'Deployment_Logs',
      'deployment_logs',
      'deployment-logs',
    ],
    filePattern: 'Deployment_*.txt',
  },
  commit: {
    summaryMaxLength: 72,
    automationMarker: 'gitship',
  },
  artifacts: {
    promptPath: join(tmpdir(), 'deployment_prompt.txt'),
    analysisPath: join(tmpdir(), 'deployment_analysis.json'),
  },
  summary: {
    maxFilesPerCategory: 5,
    maxSensitiveListed: 10,
    maxSampleDiffs: 3,
    maxDiffChars: 500,
    maxDiffCandidates: 10,
    untrackedPreviewChars: 1000,
  },
};

const positiveInt = z.number().int().positive();

/**
 * Schema for `gitship.config.json`. Every section and key is optional.
 */
export const GitshipFileConfigSchema = z
  .object({
    git: z
      .object({
        remote: z.string().min(1),
        ignoreFile: z.string().min(1),
      })
      .partial(),
    deployment: z
      .object({
        directoryNames: z.array(z.string().min(1)).min(1),
        filePattern: z.string().min(1),
      })
      .partial(),
    commit: z
      .object({
        summaryMaxLength: z.number().int().min(8),
        automationMarker: z.string().min(1),
      })
      .partial(),
    artifacts: z
      .object({
        promptPath: z.string().min(1),
        analysisPath: z.string().min(1),
      })
      .partial(),
    summary: z
      .object({
        maxFilesPerCategory: positiveInt,
        maxSensitiveListed: positiveInt,
        maxSampleDiffs: positiveInt,
        maxDiffChars: positiveInt,
        maxDiffCandidates: positiveInt,
        untrackedPreviewChars: positiveInt,
      })
      .partial(),
  })
  .partial()
  .strict();

export type GitshipFileConfig = z.infer<typeof GitshipFileConfigSchema>;

/**
 * Resolve config with env variable overrides
 *
 * @param fileConfig - Config from gitship.config.json
 * @param env - Parsed environment variables (see parseGitshipEnv)
 */
export function resolveGitshipConfig(
  fileConfig: GitshipFileConfig = {},
  env: Partial<GitshipEnv> = {}
): GitshipConfig {
  const config: GitshipConfig = {
    git: { ...defaultGitshipConfig.git, ...fileConfig.git },
    deployment: {
      directoryNames: fileConfig.deployment?.directoryNames ?? [...defaultGitshipConfig.deployment.directoryNames],
      filePattern: fileConfig.deployment?.filePattern ?? defaultGitshipConfig.deployment.filePattern,
    },
    commit: { ...defaultGitshipConfig.commit, ...fileConfig.commit },
    artifacts: { ...defaultGitshipConfig.artifacts, ...fileConfig.artifacts },
    summary: { ...defaultGitshipConfig.summary, ...fileConfig.summary },
  };

  // Environment variable overrides (highest priority)
  if (env.GITSHIP_REMOTE) {
    config.git.remote = env.GITSHIP_REMOTE;
  }

  if (env.GITSHIP_IGNORE_FILE) {
    config.git.ignoreFile = env.GITSHIP_IGNORE_FILE;
  }

  if (env.GITSHIP_PROMPT_PATH) {
    config.artifacts.promptPath = env.GITSHIP_PROMPT_PATH;
  }

  if (env.GITSHIP_ANALYSIS_PATH) {
    config.artifacts.analysisPath = env.GITSHIP_ANALYSIS_PATH;
  }

  if (env.GITSHIP_SUMMARY_MAX_LENGTH !== undefined) {
    config.commit.summaryMaxLength = env.GITSHIP_SUMMARY_MAX_LENGTH;
  }

  return config;
}
