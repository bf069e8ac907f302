import { readFileSync } from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import { CFG } from '../config';
import { normalizeAnswer } from '../engine/normalize';
import { QUESTION_IDS } from '../engine/tables';
import { AnswerValueSchema, RawAnswersSchema, SavedDecisionSchema, type RawAnswers } from '../schemas/answers';
import { warn } from '../util/logger';
import type { QuestionId, YesNo } from '../types';

export class AnswersFileError extends Error {
  readonly exitCode: number = CFG.ANSWERS_FILE_EXIT_CODE;

  constructor(message: string, readonly file: string) {
    super(`${message} (${file})`);
    this.name = 'AnswersFileError';
  }
}

function isQuestionId(id: string): id is QuestionId {
  return QUESTION_IDS.some(q => q === id);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function parseFile(file: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(file, 'utf-8');
  } catch (error) {
    throw new AnswersFileError(`Cannot read answers file: ${describe(error)}`, file);
  }

  const ext = path.extname(file).toLowerCase();
  const isYaml = ext === '.yaml' || ext === '.yml';
  try {
    return isYaml ? yaml.load(raw) : JSON.parse(raw);
  } catch (error) {
    throw new AnswersFileError(`Answers file is not valid ${isYaml ? 'YAML' : 'JSON'}: ${describe(error)}`, file);
  }
}

function extractRawAnswers(parsed: unknown, file: string): RawAnswers {
  const saved = SavedDecisionSchema.safeParse(parsed);
  if (saved.success) return saved.data.answers;

  const direct = RawAnswersSchema.safeParse(parsed);
  if (!direct.success) {
    throw new AnswersFileError('Answers file must contain an object mapping question ids to yes/no', file);
  }
  return direct.data;
}

/**
 * Loads a JSON or YAML answers file. Unknown question ids are skipped with a
 * warning whatever their value; a known id with an invalid value is fatal.
 */
export function loadAnswersFile(file: string): Partial<Record<QuestionId, YesNo>> {
  const rawAnswers = extractRawAnswers(parseFile(file), file);
  const answers: Partial<Record<QuestionId, YesNo>> = {};

  for (const [id, value] of Object.entries(rawAnswers)) {
    if (!isQuestionId(id)) {
      warn(`Ignoring unknown question id "${id}" in ${file}`);
      continue;
    }
    const parsed = AnswerValueSchema.safeParse(value);
    const normalized = parsed.success ? normalizeAnswer(String(parsed.data)) : null;
    if (!normalized) {
      throw new AnswersFileError(`Invalid answer for ${id}: ${JSON.stringify(value) ?? String(value)} (expected yes/no)`, file);
    }
    answers[id] = normalized;
  }

  return answers;
}
