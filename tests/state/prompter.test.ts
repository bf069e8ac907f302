import { PassThrough } from 'node:stream';
import { describe, expect, it } from 'vitest';
import { TIER1_QUESTIONS } from '../../src/prompts/questions';
import { InputClosedError, createConsolePrompter } from '../../src/state/prompter';

const [q1, q2, q3] = TIER1_QUESTIONS;

function streams() {
  const input = new PassThrough();
  const output = new PassThrough();
  const written: string[] = [];
  output.on('data', chunk => written.push(String(chunk)));
  return { input, output, written: () => written.join('') };
}

describe('createConsolePrompter', () => {
  it('rejects a pending question when the input ends', async () => {
    const { input, output } = streams();
    const prompter = createConsolePrompter(input, output);
    const pending = prompter.ask(q1);
    input.end();
    await expect(pending).rejects.toBeInstanceOf(InputClosedError);
    await expect(pending).rejects.toThrow('Input ended before Q1 was answered');
    prompter.close();
  });

  it('reads piped lines in order and re-asks on invalid input', async () => {
    const { input, output, written } = streams();
    const prompter = createConsolePrompter(input, output);
    input.end('maybe\ny\nN\n');

    expect(await prompter.ask(q1)).toBe('yes');
    expect(await prompter.ask(q2)).toBe('no');
    await expect(prompter.ask(q3)).rejects.toBeInstanceOf(InputClosedError);
    prompter.close();

    expect(written()).toContain("Please answer 'y' or 'n'.\n");
    expect(written().startsWith(`${q1.prompt} [y/n]: `)).toBe(true);
  });
});
