import { CFG } from '../config';
import { FALLBACK_LABEL, PRIMARY_LABELS, SCORE_BONUSES, isTier1Method } from './tables';
import { isYes } from './normalize';
import type { Answers, PrimaryLabel, Scores, Tier1Method } from '../types';

/**
 * BASE for every Tier-1 method that was selected, plus BONUS for each matching
 * Tier-2 "yes" in SCORE_BONUSES. The fallback and refinements are never scored.
 */
export function scoreCandidates(candidates: readonly PrimaryLabel[], answers: Answers): Scores {
  const scores: Scores = {};
  for (const label of candidates) {
    if (!isTier1Method(label)) continue;
    let points: number = CFG.BASE_SCORE;
    for (const bonus of SCORE_BONUSES) {
      if (bonus.method === label && isYes(answers[bonus.when])) points += CFG.BONUS_SCORE;
    }
    scores[label] = points;
  }
  return scores;
}

function priorityIndex(label: PrimaryLabel): number {
  return PRIMARY_LABELS.indexOf(label);
}

/** Score descending, ties broken by canonical priority (never insertion order). */
export function rankScores(scores: Scores): Tier1Method[] {
  const entries: [Tier1Method, number][] = [];
  for (const label of PRIMARY_LABELS) {
    if (!isTier1Method(label)) continue;
    const points = scores[label];
    if (points !== undefined) entries.push([label, points]);
  }
  return entries
    .sort((a, b) => b[1] - a[1] || priorityIndex(a[0]) - priorityIndex(b[0]))
    .map(([label]) => label);
}

export interface Pick {
  topPick: PrimaryLabel | null;
  alsoConsider: PrimaryLabel[];
}

export function pickTop(ranked: readonly Tier1Method[], candidates: readonly PrimaryLabel[]): Pick {
  if (ranked.length > 0) {
    const [topPick, ...alsoConsider] = ranked;
    return { topPick, alsoConsider };
  }
  // Empty score map: only reachable when the fallback was the sole candidate.
  if (candidates.includes(FALLBACK_LABEL)) return { topPick: FALLBACK_LABEL, alsoConsider: [] };
  return { topPick: candidates[0] ?? null, alsoConsider: [] };
}
