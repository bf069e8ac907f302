import rawBank from '../data/questions.json';
import { QuestionBankSchema } from '../schemas/questions';
import type { Question, QuestionId } from '../types';

const bank = QuestionBankSchema.parse(rawBank);

export const TIER1_QUESTIONS: readonly Question[] = bank.tier1.map((q): Question => ({ ...q, tier: 1 }));
export const TIER2_QUESTIONS: readonly Question[] = bank.tier2.map((q): Question => ({ ...q, tier: 2 }));
export const TIER3_QUESTIONS: readonly Question[] = bank.tier3.map((q): Question => ({ ...q, tier: 3 }));

export const ALL_QUESTIONS: readonly Question[] = [...TIER1_QUESTIONS, ...TIER2_QUESTIONS, ...TIER3_QUESTIONS];

const byId = new Map<QuestionId, Question>(ALL_QUESTIONS.map(q => [q.id, q]));

export function getQuestion(id: QuestionId): Question | undefined {
  return byId.get(id);
}

/** Tier-3 questions gating the given Tier-1 candidates, in declaration order. */
export function resolutionQuestionsFor(candidates: readonly string[]): Question[] {
  return TIER3_QUESTIONS.filter(q => q.method !== undefined && candidates.includes(q.method));
}
