import { createInterface } from 'node:readline/promises';
import type { Readable, Writable } from 'node:stream';

/**
 * Line-oriented question/answer channel for the wizard
 */
export interface Prompter {
  /** Resolves null once input has ended */
  ask(question: string): Promise<string | null>;
  print(line: string): void;
  close(): void;
}

export function createReadlinePrompter(input: Readable, output: Writable): Prompter {
  const rl = createInterface({ input, output });
  let closed = false;
  rl.on('close', () => {
    closed = true;
  });

  return {
    ask(question: string): Promise<string | null> {
      if (closed) {
        return Promise.resolve(null);
      }
      return new Promise((resolve, reject) => {
        const onClose = () => resolve(null);
        rl.once('close', onClose);
        rl.question(question).then(
          (answer) => {
            rl.off('close', onClose);
            resolve(answer);
          },
          (error: unknown) => {
            rl.off('close', onClose);
            reject(error);
          }
        );
      });
    },
    print(line: string): void {
      output.write(`${line}\n`);
    },
    close(): void {
      rl.close();
    },
  };
}
