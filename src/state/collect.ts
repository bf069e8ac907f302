import { selectPrimary } from '../engine/select';
import { TIER1_QUESTIONS, TIER2_QUESTIONS, resolutionQuestionsFor } from '../prompts/questions';
import { log } from '../util/logger';
import type { Answers, Question, QuestionId, YesNo } from '../types';
import type { Prompter } from './prompter';

export interface CollectOptions {
  overrides?: Answers; // CLI flags, highest precedence
  fileAnswers?: Answers;
  prompter?: Prompter; // absent = non-interactive: unanswered questions become "no"
}

/**
 * Gathers a complete answer set: Tier-1, Tier-2, then only the Tier-3
 * questions gated by the Tier-1 candidates those answers produce.
 */
export async function collectAnswers(options: CollectOptions = {}): Promise<Answers> {
  const { overrides = {}, fileAnswers = {}, prompter } = options;
  const answers: Partial<Record<QuestionId, YesNo>> = { ...fileAnswers, ...overrides };

  async function fill(questions: readonly Question[]) {
    for (const q of questions) {
      if (answers[q.id] !== undefined) continue;
      answers[q.id] = prompter ? await prompter.ask(q) : 'no';
    }
  }

  await fill(TIER1_QUESTIONS);
  await fill(TIER2_QUESTIONS);

  const { labels } = selectPrimary(answers);
  const gated = resolutionQuestionsFor(labels);
  log('Resolution questions:', gated.map(q => q.id).join(', ') || '(none)');
  await fill(gated);

  return answers;
}
