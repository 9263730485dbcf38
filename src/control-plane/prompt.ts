import { createInterface } from 'node:readline';

/**
 * Only "y" or "Y" confirms; anything else declines.
 */
export function parseConfirmation(answer: string): boolean {
  return answer.trim().toLowerCase() === 'y';
}

/**
 * Ask a Y/N question on the terminal. Input that ends before an answer
 * (closed stdin, Ctrl+D) declines.
 */
export function confirm(
  question: string,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<boolean> {
  const rl = createInterface({ input, output });

  return new Promise((resolve) => {
    // End of input before an answer reads as N
    rl.once('close', () => resolve(false));

    rl.question(`${question} (Y/N): `, (answer) => {
      resolve(parseConfirmation(answer));
      rl.close();
    });
  });
}
