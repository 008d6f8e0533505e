import type { Ora } from 'ora';
import { createConfirm, isInteractive, type ConfirmFunction } from '@gitship/core';

export interface CommandConfirm {
  interactive: boolean;
  confirm: ConfirmFunction;
}

/**
 * Confirmation that pauses the spinner while the question is on screen.
 * `--yes` makes a session interactive even without a terminal.
 */
export function createSpinnerConfirm(spinner: Ora, yes: boolean): CommandConfirm {
  const ask = createConfirm({ autoConfirm: yes, output: process.stderr });

  return {
    interactive: yes || isInteractive(process.stdin),
    confirm: async (question) => {
      const spinning = spinner.isSpinning;
      spinner.stop();
      try {
        return await ask(question);
      } finally {
        if (spinning) {
          spinner.start();
        }
      }
    },
  };
}
