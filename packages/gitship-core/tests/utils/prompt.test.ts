/**
 * Tests for prompt.ts - yes/no confirmation
 */

import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { createConfirm, isInteractive, promptUserConfirmation } from '../../src/utils/prompt';

function terminalInput(): PassThrough & { isTTY: boolean } {
  return Object.assign(new PassThrough(), { isTTY: true });
}

describe('promptUserConfirmation', () => {
  it('auto-confirms with --yes and says so', async () => {
    const output = new PassThrough();

    await expect(promptUserConfirmation('Add 1 sensitive file(s) to .gitignore?', { autoConfirm: true, output })).resolves.toBe(true);
    expect(String(output.read())).toBe('Add 1 sensitive file(s) to .gitignore? [auto-confirmed with --yes]\n');
  });

  it('answers no without a terminal', async () => {
    const input = new PassThrough();
    await expect(promptUserConfirmation('Proceed?', { input, output: new PassThrough() })).resolves.toBe(false);
  });

  it.each([
    ['y\n', true],
    ['YES\n', true],
    ['\n', false],
    ['nope\n', false],
  ])('reads %j from a terminal', async (answer, expected) => {
    const input = terminalInput();
    const output = new PassThrough();

    const result = promptUserConfirmation('Proceed?', { input, output });
    input.write(answer);

    await expect(result).resolves.toBe(expected);
  });

  it('createConfirm binds the options', async () => {
    const confirm = createConfirm({ autoConfirm: true, output: new PassThrough() });
    await expect(confirm('Proceed?')).resolves.toBe(true);
  });
});

describe('isInteractive', () => {
  it('requires a TTY', () => {
    expect(isInteractive({ isTTY: true })).toBe(true);
    expect(isInteractive({})).toBe(false);
  });
});
