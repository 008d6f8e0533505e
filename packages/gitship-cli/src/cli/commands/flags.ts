/**
 * Shared command flags definitions
 *
 * Define flags once, register them on every command that takes them.
 */

import type { Command } from 'commander';

export interface FlagDefinition {
  /** commander flag syntax */
  flags: string;
  description: string;
}

/**
 * Flags for the analyze command
 */
export const analyzeFlags = {
  json: {
    flags: '--json',
    description: 'Print the analysis as JSON',
  },
  yes: {
    flags: '-y, --yes',
    description: 'Add detected sensitive files to .gitignore without asking',
  },
} as const satisfies Record<string, FlagDefinition>;

export interface AnalyzeFlags {
  json?: boolean;
  yes?: boolean;
}

/**
 * Flags for the deploy command
 */
export const deployFlags = {
  dryRun: {
    flags: '--dry-run',
    description: 'Print the commit plan without staging, committing or pushing',
  },
  // commander turns --no-push into `push: false`
  noPush: {
    flags: '--no-push',
    description: 'Commit but do not push',
  },
  json: {
    flags: '--json',
    description: 'Print the deploy result as JSON',
  },
  yes: {
    flags: '-y, --yes',
    description: 'Add detected sensitive files to .gitignore without asking',
  },
} as const satisfies Record<string, FlagDefinition>;

export interface DeployFlags {
  dryRun?: boolean;
  push?: boolean;
  json?: boolean;
  yes?: boolean;
}

/**
 * Register flag definitions on a command
 */
export function applyFlags(command: Command, definitions: Record<string, FlagDefinition>): Command {
  for (const { flags, description } of Object.values(definitions)) {
    command.option(flags, description);
  }
  return command;
}
