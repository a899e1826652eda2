/**
 * Interactive stdin prompt
 */

import * as readline from 'node:readline';

/**
 * Ask one question on the terminal
 *
 * Resolves with an empty string if stdin closes before an answer arrives.
 */
export function promptLine(
  question: string,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<string> {
  const rl = readline.createInterface({ input, output, terminal: false });

  return new Promise<string>((resolve) => {
    rl.once('close', () => resolve(''));
    rl.question(question, (answer) => {
      resolve(answer);
      rl.close();
    });
  });
}
