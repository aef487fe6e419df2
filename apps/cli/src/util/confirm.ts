/**
 * Interactive y/N confirmation for destructive commands.
 */

import { createInterface } from 'node:readline';
import { usageError } from '../errors.js';

function promptUser(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}

/**
 * Resolves when the action is confirmed (--yes or a typed "y").
 * Non-interactive sessions must pass --yes.
 */
export async function confirmAction(question: string, opts: { yes: boolean }): Promise<void> {
  if (opts.yes) return;
  if (!process.stdin.isTTY) {
    throw usageError('Confirmation required: re-run with --yes in non-interactive sessions.', 'CONFIRMATION_REQUIRED');
  }
  const answer = await promptUser(`${question} (y/N): `);
  if (answer.trim().toLowerCase() !== 'y') {
    throw usageError('Aborted.', 'CONFIRMATION_DECLINED');
  }
}
