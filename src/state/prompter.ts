import { createInterface } from 'node:readline/promises';
import { stdin, stdout } from 'node:process';
import { CFG } from '../config';
import { normalizeAnswer } from '../engine/normalize';
import type { Question, YesNo } from '../types';

export interface Prompter {
  ask(question: Question): Promise<YesNo>;
  close(): void;
}

export class InputClosedError extends Error {
  readonly exitCode: number = CFG.INPUT_CLOSED_EXIT_CODE;

  constructor(readonly questionId: string) {
    super(`Input ended before ${questionId.toUpperCase()} was answered`);
    this.name = 'InputClosedError';
  }
}

export function createConsolePrompter(
  input: NodeJS.ReadableStream = stdin,
  output: NodeJS.WritableStream = stdout
): Prompter {
  const rl = createInterface({ input, output });
  // Buffers piped lines between questions; finishes when the input ends.
  const lines = rl[Symbol.asyncIterator]();
  return {
    async ask(question) {
      for (;;) {
        output.write(`${question.prompt} [y/n]: `);
        const next = await lines.next();
        if (next.done) throw new InputClosedError(question.id);
        const norm = normalizeAnswer(next.value);
        if (norm) return norm;
        output.write("Please answer 'y' or 'n'.\n");
      }
    },
    close() {
      rl.close();
    }
  };
}
