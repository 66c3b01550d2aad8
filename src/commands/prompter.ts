import { createInterface } from 'node:readline';
import type { Prompter } from './types.js';

/**
 * Prompter reading lines from stdin. Works with piped input as well as a terminal.
 */
export function createStdinPrompter(): Prompter {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: false,
  });
  const lines = rl[Symbol.asyncIterator]();

  return {
    async ask(question: string): Promise<string | null> {
      if (question) {
        process.stdout.write(question);
      }
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    close(): void {
      rl.close();
    },
  };
}
