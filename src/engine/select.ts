import { TIER1_QUESTIONS, TIER2_QUESTIONS } from '../prompts/questions';
import { FALLBACK_LABEL, PRIMARY_BY_QUESTION, REFINEMENTS_BY_QUESTION, TIER1_IDS, TIER2_IDS } from './tables';
import { isYes } from './normalize';
import type { Answers, MethodLabel, PrimaryLabel, RefinementLabel, Selection, Tier1Id, Tier2Id } from '../types';

export const FALLBACK_RATIONALE = 'No strong fit identified in Q1–Q6; suggest reassessing scope or combining methods.';

export function rationaleLine(id: string, why: string): string {
  return `${id.toUpperCase()}: ${why}`;
}

function isTier1Id(id: string): id is Tier1Id {
  return TIER1_IDS.some(t => t === id);
}

function isTier2Id(id: string): id is Tier2Id {
  return TIER2_IDS.some(t => t === id);
}

/**
 * Tier-1: one primary label per "yes", in question order, deduplicated.
 * Never returns an empty list; the fallback fills in when nothing matched.
 */
export function selectPrimary(answers: Answers): Selection<PrimaryLabel> {
  const labels: PrimaryLabel[] = [];
  const rationale: string[] = [];

  for (const q of TIER1_QUESTIONS) {
    if (!isTier1Id(q.id) || !isYes(answers[q.id])) continue;
    const label = PRIMARY_BY_QUESTION[q.id];
    if (!labels.includes(label)) {
      labels.push(label);
      rationale.push(rationaleLine(q.id, q.rationale));
    }
  }

  if (labels.length === 0) {
    labels.push(FALLBACK_LABEL);
    rationale.push(FALLBACK_RATIONALE);
  }

  return { labels, rationale };
}

/** Tier-2: additive refinement labels, independent of Tier-1. */
export function selectRefinements(answers: Answers): Selection<RefinementLabel> {
  const labels: RefinementLabel[] = [];
  const rationale: string[] = [];

  for (const q of TIER2_QUESTIONS) {
    if (!isTier2Id(q.id) || !isYes(answers[q.id])) continue;
    for (const label of REFINEMENTS_BY_QUESTION[q.id]) {
      if (!labels.includes(label)) labels.push(label);
    }
    rationale.push(rationaleLine(q.id, q.rationale));
  }

  return { labels, rationale };
}

export function mergeRecommendations(
  primary: readonly PrimaryLabel[],
  refinements: readonly RefinementLabel[]
): MethodLabel[] {
  const merged: MethodLabel[] = [...primary];
  for (const label of refinements) {
    if (!merged.includes(label)) merged.push(label);
  }
  return merged;
}
