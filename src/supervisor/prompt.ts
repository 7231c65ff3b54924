import { createInterface } from 'node:readline';
import type { ServiceArgument } from './types';

export type ArgumentPrompt = (argument: ServiceArgument) => Promise<string>;

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Asks for the argument value on the terminal. A blank answer, or an input
 * that closes before answering, yields the default.
 */
export function createArgumentPrompt(streams: PromptStreams = { input: process.stdin, output: process.stdout }): ArgumentPrompt {
  return (argument) => new Promise((resolve) => {
    const rl = createInterface({ input: streams.input, output: streams.output, terminal: false });
    let answered = false;

    rl.on('close', () => {
      if (!answered) {
        resolve(argument.defaultValue);
      }
    });

    rl.question(`${argument.prompt} (default: ${argument.defaultValue}): `, (answer) => {
      answered = true;
      rl.close();
      resolve(answer.trim() || argument.defaultValue);
    });
  });
}
