import type { Interface } from 'node:readline/promises';
import type { Prompter } from './prompter.js';

const YES = new Set(['y', 'yes']);

export function createTerminalPrompter(
  rl: Interface,
  output: { write(chunk: string): unknown } = process.stdout,
): Prompter {
  return {
    async confirm(message, signal) {
      const answer = await rl.question(`${message} [y/N] `, { signal });
      return YES.has(answer.trim().toLowerCase());
    },
    async alert(message) {
      output.write(`${message}\n`);
    },
  };
}
