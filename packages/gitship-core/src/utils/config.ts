/**
 * Configuration loading: gitship.config.json + GITSHIP_* environment
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ZodError } from 'zod';
import {
  CONFIG_FILE_NAME,
  GitshipFileConfigSchema,
  parseGitshipEnv,
  resolveGitshipConfig,
  type GitshipConfig,
  type GitshipFileConfig,
} from '@gitship/contracts';
import { ConfigError, errorMessage } from '../errors';

function formatZodError(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Read and validate the config file; a missing file is an empty config
 */
export async function readFileConfig(repoRoot: string): Promise<GitshipFileConfig> {
  const path = join(repoRoot, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new ConfigError(`Could not read ${path}: ${errorMessage(error)}`, error);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`${path} is not valid JSON: ${errorMessage(error)}`, error);
  }

  const result = GitshipFileConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(`Invalid ${CONFIG_FILE_NAME}: ${formatZodError(result.error)}`, result.error);
  }

  return result.data;
}

/**
 * Effective configuration for a repository
 */
export async function loadGitshipConfig(
  repoRoot: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<GitshipConfig> {
  const fileConfig = await readFileConfig(repoRoot);

  try {
    return resolveGitshipConfig(fileConfig, parseGitshipEnv(env));
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError(`Invalid environment: ${formatZodError(error)}`, error);
    }
    throw error;
  }
}
