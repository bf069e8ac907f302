import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { z } from 'zod';
import { CFG } from '../config';
import { decide } from '../engine/decide';
import { normalizeAnswer } from '../engine/normalize';
import { ALL_QUESTIONS } from '../prompts/questions';
import { render } from '../render';
import { toPayload } from '../render/json';
import { collectAnswers } from '../state/collect';
import { AnswersFileError, loadAnswersFile } from '../state/answersFile';
import { InputClosedError, createConsolePrompter, type Prompter } from '../state/prompter';
import { saveDecision } from '../util/decisionStore';
import { log } from '../util/logger';
import type { Answers, QuestionId, YesNo } from '../types';

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
  createPrompter: () => Prompter;
}

const defaultIO: CliIO = {
  out: text => process.stdout.write(text),
  err: text => process.stderr.write(text),
  createPrompter: () => createConsolePrompter()
};

const CliOptionsSchema = z.object({
  format: z.enum(['text', 'markdown', 'json']),
  json: z.boolean().optional(),
  answers: z.string().optional(),
  nonInteractive: z.boolean().optional(),
  saveDir: z.string().optional(),
  listQuestions: z.boolean().optional()
});

function parseAnswerArg(value: string): YesNo {
  const norm = normalizeAnswer(value);
  if (!norm) throw new InvalidArgumentError('Expected yes or no (y/n, true/false, t/f, 1/0).');
  return norm;
}

export function buildProgram(): Command {
  const program = new Command()
    .name('threat-model-selector')
    .description('Recommend a threat modeling methodology from a short yes/no questionnaire');

  for (const q of ALL_QUESTIONS) {
    program.option(`--${q.id} <answer>`, `${q.prompt} (yes/no)`, parseAnswerArg);
  }

  program
    .addOption(
      new Option('-f, --format <format>', 'Output format')
        .choices(['text', 'markdown', 'json'])
        .default(CFG.DEFAULT_FORMAT)
    )
    .option('--json', 'Shortcut for --format json')
    .option('-a, --answers <file>', 'Load answers from a JSON or YAML file')
    .option('-n, --non-interactive', 'Answer every unanswered question with "no" instead of prompting', CFG.NON_INTERACTIVE)
    .option('--save-dir <dir>', 'Also write the JSON result to <dir>/decision.json', CFG.SAVE_DIR || undefined)
    .option('--list-questions', 'Print the question bank and exit');

  return program;
}

export function listQuestions(): string {
  return ALL_QUESTIONS.map(q => {
    const gate = q.method ? ` (asked when ${q.method} is selected)` : '';
    return `${q.id.toUpperCase()} [tier ${q.tier}] ${q.prompt}${gate}`;
  }).join('\n') + '\n';
}

function flagAnswers(opts: Record<string, unknown>): Answers {
  const answers: Partial<Record<QuestionId, YesNo>> = {};
  for (const q of ALL_QUESTIONS) {
    const value = opts[q.id];
    if (value === 'yes' || value === 'no') answers[q.id] = value;
  }
  return answers;
}

/** Parses argv (user args only), collects answers, prints the decision. Resolves to the exit status. */
export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  const program = buildProgram()
    .exitOverride()
    .configureOutput({ writeOut: io.out, writeErr: io.err });

  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }

  const raw = program.opts();
  const opts = CliOptionsSchema.parse(raw);

  if (opts.listQuestions) {
    io.out(listQuestions());
    return 0;
  }

  let fileAnswers: Answers | undefined;
  if (opts.answers) {
    try {
      fileAnswers = loadAnswersFile(opts.answers);
    } catch (error) {
      if (error instanceof AnswersFileError) {
        io.err(`[TM] ${error.message}\n`);
        return error.exitCode;
      }
      throw error;
    }
  }

  const prompter = opts.nonInteractive ? undefined : io.createPrompter();
  let answers: Answers;
  try {
    answers = await collectAnswers({ overrides: flagAnswers(raw), fileAnswers, prompter });
  } catch (error) {
    if (error instanceof InputClosedError) {
      io.err(`[TM] ${error.message}\n`);
      return error.exitCode;
    }
    throw error;
  } finally {
    prompter?.close();
  }

  const result = decide(answers);
  io.out(render(result, opts.json ? 'json' : opts.format) + '\n');

  if (opts.saveDir) {
    const file = saveDecision(opts.saveDir, toPayload(result));
    log('Saved decision to', file);
  }

  return 0;
}
