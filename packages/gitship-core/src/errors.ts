/**
 * Typed failures raised by gitship
 */

export type GitshipErrorCode =
  | 'E_NOT_A_REPO'
  | 'E_NO_DEPLOYMENT_LOG'
  | 'E_GIT'
  | 'E_CONFIG';

export class GitshipError extends Error {
  readonly code: GitshipErrorCode;
  /** Remediation shown to the operator under the message */
  readonly hint?: string;

  constructor(code: GitshipErrorCode, message: string, options: { hint?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.hint = options.hint;
  }
}

export class NotARepositoryError extends GitshipError {
  constructor(cwd: string, cause?: unknown) {
    super('E_NOT_A_REPO', `Not in a git repository: ${cwd}`, {
      hint: 'Run gitship from inside a git working tree.',
      cause,
    });
  }
}

export class DeploymentLogNotFoundError extends GitshipError {
  readonly searched: string[];

  constructor(message: string, searched: string[]) {
    super('E_NO_DEPLOYMENT_LOG', message, {
      hint: 'Run the deployment log generator first to create a Deployment_*.txt log.',
    });
    this.searched = searched;
  }
}

export class GitCommandError extends GitshipError {
  readonly command: string;

  constructor(command: string, cause: unknown) {
    super('E_GIT', `git ${command} failed: ${errorMessage(cause)}`, { cause });
    this.command = command;
  }
}

export class ConfigError extends GitshipError {
  constructor(message: string, cause?: unknown) {
    super('E_CONFIG', message, {
      hint: 'Fix gitship.config.json or the GITSHIP_* environment variables.',
      cause,
    });
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
