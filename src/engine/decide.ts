import { QUESTION_IDS } from './tables';
import { mergeRecommendations, selectPrimary, selectRefinements } from './select';
import { pickTop, rankScores, scoreCandidates } from './score';
import { resolveAll, resolutionRationale, resolveLabel } from './resolve';
import { detailFor } from '../prompts/details';
import { log } from '../util/logger';
import type { Answers, DecisionResult, QuestionId, YesNo } from '../types';

// Echo answers in declaration order so output is stable regardless of input order.
function orderAnswers(answers: Answers): Answers {
  const ordered: Partial<Record<QuestionId, YesNo>> = {};
  for (const id of QUESTION_IDS) {
    const value = answers[id];
    if (value !== undefined) ordered[id] = value;
  }
  return ordered;
}

/**
 * Runs Tier-1 selection, Tier-2 refinement, scoring and Tier-3 resolution over
 * one answer set. Pure: fresh containers per call, no I/O beyond debug logging.
 * Scores stay keyed by the ambiguous Tier-1 label; everything displayed is resolved.
 */
export function decide(answers: Answers): DecisionResult {
  const primary = selectPrimary(answers);
  const refinements = selectRefinements(answers);
  const recommendations = mergeRecommendations(primary.labels, refinements.labels);

  const scores = scoreCandidates(primary.labels, answers);
  const ranked = rankScores(scores);
  const { topPick, alsoConsider } = pickTop(ranked, primary.labels);
  log('Scores:', scores);
  log('Ranked:', ranked);

  const resolved = resolveAll(recommendations, answers);
  const rationale = [
    ...primary.rationale,
    ...refinements.rationale,
    ...resolutionRationale(recommendations, answers)
  ];

  return {
    answers: orderAnswers(answers),
    recommendations: resolved,
    details: resolved.map(detailFor),
    rationale,
    scores,
    topPick: topPick === null ? null : resolveLabel(topPick, answers),
    alsoConsider: resolveAll(alsoConsider, answers)
  };
}

export { normalizeAnswer } from './normalize';
export type { Answers, DecisionResult } from '../types';
