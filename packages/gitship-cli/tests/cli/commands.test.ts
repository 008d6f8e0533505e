/**
 * Tests for the analyze and deploy commands
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { CommanderError } from 'commander';
import {
  DeploymentLogNotFoundError,
  runAnalyze,
  runDeploy,
  type AnalyzeOutcome,
  type DeployOutcome,
} from '@gitship/core';
import { executeAnalyze } from '../../src/cli/commands/analyze';
import { executeDeploy } from '../../src/cli/commands/deploy';
import { createProgram, runCli } from '../../src/cli';

vi.mock('@gitship/core', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@gitship/core')>()),
  runAnalyze: vi.fn(),
  runDeploy: vi.fn(),
}));

const ANALYZE_OUTCOME: AnalyzeOutcome = {
  exitCode: 1,
  output: {
    changedFiles: 2,
    classification: { sensitive: ['secret_api_key.txt'], ignored: [], eligible: ['app.py'] },
    categories: { Other: ['app.py'] },
    promptPath: '/tmp/deployment_prompt.txt',
    analysisPath: '/tmp/deployment_analysis.json',
    addedToIgnoreFile: false,
  },
  warnings: [],
};

const DEPLOY_OUTCOME: DeployOutcome = {
  exitCode: 0,
  output: {
    stage: 'pushed',
    branch: 'main',
    classification: { sensitive: [], ignored: [], eligible: ['app.py'] },
    plan: {
      stage: ['app.py'],
      remove: [],
      skipped: [],
      message: 'Deployment 42: Fix login bug\n\nBranch: main\n',
      push: { remote: 'origin', branch: 'main', setUpstream: false },
    },
    commitSha: 'abc1234def5678',
    pushed: true,
    warnings: [],
  },
};

describe('commands', () => {
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    stdout = [];
    stderr = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stderr.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.mocked(runAnalyze).mockReset();
    vi.mocked(runDeploy).mockReset();
    process.exitCode = undefined;
  });

  it('analyze --json prints the output and returns the workflow exit code', async () => {
    vi.mocked(runAnalyze).mockResolvedValue(ANALYZE_OUTCOME);

    const exitCode = await executeAnalyze({ json: true }, '/repo');

    expect(exitCode).toBe(1);
    expect(JSON.parse(stdout.join(''))).toEqual(ANALYZE_OUTCOME.output);
    expect(vi.mocked(runAnalyze).mock.calls[0]?.[0]).toMatchObject({ cwd: '/repo' });
  });

  it('analyze --yes makes the session interactive', async () => {
    vi.mocked(runAnalyze).mockResolvedValue(ANALYZE_OUTCOME);

    await executeAnalyze({ yes: true, json: true }, '/repo');

    expect(vi.mocked(runAnalyze).mock.calls[0]?.[0]).toMatchObject({ interactive: true });
  });

  it('analyze lists the sensitive files on stderr', async () => {
    vi.mocked(runAnalyze).mockResolvedValue(ANALYZE_OUTCOME);

    await executeAnalyze({}, '/repo');

    expect(stderr.join('')).toContain('1 potentially sensitive file(s) detected and excluded:');
    expect(stdout.join('')).toContain('Prompt saved to: /tmp/deployment_prompt.txt');
  });

  it('deploy prints the error and its hint, then returns 1', async () => {
    vi.mocked(runDeploy).mockRejectedValue(new DeploymentLogNotFoundError('Deployment logs directory not found', []));

    const exitCode = await executeDeploy({}, '/repo');

    expect(exitCode).toBe(1);
    const errors = stderr.join('');
    expect(errors).toContain('Error: Deployment logs directory not found');
    expect(errors).toContain('Run the deployment log generator first');
  });

  it('deploy --json prints the deploy output', async () => {
    vi.mocked(runDeploy).mockResolvedValue(DEPLOY_OUTCOME);

    const exitCode = await executeDeploy({ json: true }, '/repo');

    expect(exitCode).toBe(0);
    expect(JSON.parse(stdout.join(''))).toEqual(DEPLOY_OUTCOME.output);
  });

  it('deploy shows the short sha and summary line', async () => {
    vi.mocked(runDeploy).mockResolvedValue(DEPLOY_OUTCOME);

    await executeDeploy({}, '/repo');

    expect(stdout.join('')).toContain('Deployment 42: Fix login bug');
    expect(stdout.join('')).toContain('[abc1234]');
  });

  it('maps --dry-run and --no-push onto the workflow', async () => {
    vi.mocked(runDeploy).mockResolvedValue(DEPLOY_OUTCOME);

    await createProgram().parseAsync(['node', 'gitship', 'deploy', '--dry-run', '--no-push', '--json']);

    expect(vi.mocked(runDeploy).mock.calls[0]?.[0]).toMatchObject({ dryRun: true, skipPush: true });
    expect(process.exitCode).toBe(0);
  });

  it('pushes by default', async () => {
    vi.mocked(runDeploy).mockResolvedValue({ ...DEPLOY_OUTCOME, exitCode: 1 });

    await createProgram().parseAsync(['node', 'gitship', 'deploy', '--json']);

    expect(vi.mocked(runDeploy).mock.calls[0]?.[0]).toMatchObject({ dryRun: false, skipPush: false });
    expect(process.exitCode).toBe(1);
  });
});

describe('runCli', () => {
  beforeEach(() => {
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('treats --version as success', async () => {
    await expect(runCli(['node', 'gitship', '--version'])).resolves.toBeUndefined();
  });

  it('treats --help as success', async () => {
    await expect(runCli(['node', 'gitship', '--help'])).resolves.toBeUndefined();
  });

  it('treats deploy --help as success', async () => {
    await expect(runCli(['node', 'gitship', 'deploy', '--help'])).resolves.toBeUndefined();
  });

  it('throws instead of exiting on an unknown subcommand option', async () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    const error = await runCli(['node', 'gitship', 'deploy', '--bogus']).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CommanderError);
    expect(error).toMatchObject({ code: 'commander.unknownOption' });
    expect(stderr).toHaveBeenCalledWith(chalk.red("error: unknown option '--bogus'\n"));
    expect(runDeploy).not.toHaveBeenCalled();
  });

  it('registers both commands', () => {
    expect(createProgram().commands.map((command) => command.name())).toEqual(['analyze', 'deploy']);
  });
});
