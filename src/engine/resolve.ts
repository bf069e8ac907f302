import { getQuestion } from '../prompts/questions';
import { RESOLUTION_RULES, isTier1Method } from './tables';
import { isYes } from './normalize';
import { rationaleLine } from './select';
import type { Answers, MethodLabel, Tier3Id } from '../types';

export interface Resolution {
  label: MethodLabel;
  decidedBy?: Tier3Id;
}

/**
 * Rewrites an ambiguous Tier-1 label to its specific variant. The first variant
 * answered "yes" wins; with no "yes" the label comes back unchanged. Labels
 * without rules (fallback, refinements, already-resolved) pass through.
 */
export function resolveWithReason(label: MethodLabel, answers: Answers): Resolution {
  if (!isTier1Method(label)) return { label };
  const variant = RESOLUTION_RULES[label].find(v => isYes(answers[v.question]));
  return variant ? { label: variant.label, decidedBy: variant.question } : { label };
}

export function resolveLabel(label: MethodLabel, answers: Answers): MethodLabel {
  return resolveWithReason(label, answers).label;
}

export function resolveAll(labels: readonly MethodLabel[], answers: Answers): MethodLabel[] {
  return labels.map(label => resolveLabel(label, answers));
}

/** One rationale line per label that was actually rewritten, in input order. */
export function resolutionRationale(labels: readonly MethodLabel[], answers: Answers): string[] {
  const lines: string[] = [];
  for (const label of labels) {
    const { decidedBy } = resolveWithReason(label, answers);
    if (!decidedBy) continue;
    const question = getQuestion(decidedBy);
    if (question) lines.push(rationaleLine(question.id, question.rationale));
  }
  return lines;
}
