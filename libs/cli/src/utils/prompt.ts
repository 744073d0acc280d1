/**
 * y/n confirmation prompts on the terminal
 */

import * as readline from 'node:readline';
import { AFFIRMATIVE } from '@kneeboard/ipc';
import type { Prompter } from '@kneeboard/deploy';

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Only the exact affirmative token continues; anything else, including an
 * empty answer or a closed input, is a decline.
 */
export function isAffirmative(answer: string): boolean {
  return answer.trim() === AFFIRMATIVE;
}

export function createTerminalPrompter(
  streams: PromptStreams = { input: process.stdin, output: process.stdout },
): Prompter {
  return {
    confirm(question: string): Promise<boolean> {
      const rl = readline.createInterface({ input: streams.input, output: streams.output });

      return new Promise<boolean>((resolve) => {
        let answered = false;
        rl.once('close', () => {
          if (!answered) resolve(false);
        });
        rl.question(question, (answer) => {
          answered = true;
          rl.close();
          resolve(isAffirmative(answer));
        });
      });
    },
  };
}
