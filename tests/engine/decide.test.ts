import { describe, expect, it } from 'vitest';
import { decide } from '../../src/engine/decide';
import { FALLBACK_RATIONALE } from '../../src/engine/select';
import { REFINEMENT_LABELS, TIER1_IDS, TIER2_IDS } from '../../src/engine/tables';
import type { Answers, QuestionId, YesNo } from '../../src/types';

const FALLBACK = 'Reconsider scope / combine methods';
const BASE = 3;

// Bonus table as published: method -> Tier-2 questions worth +1 each
const BONUSES: Record<string, QuestionId[]> = {
  'STRIDE': ['q9'],
  'LINDDUN': ['q7'],
  'PASTA': ['q11', 'q10'],
  'OCTAVE or FAIR': ['q10', 'q7'],
  'Attack Trees + MITRE ATT&CK + CAPEC': ['q11'],
  'VAST or Security Cards': ['q9']
};

const TIER12_IDS: QuestionId[] = [...TIER1_IDS, ...TIER2_IDS];

function answersFromMask(mask: number): Answers {
  const answers: Partial<Record<QuestionId, YesNo>> = {};
  TIER12_IDS.forEach((id, bit) => {
    answers[id] = mask & (1 << bit) ? 'yes' : 'no';
  });
  return answers;
}

describe('decide scenarios', () => {
  it('all no: fallback only, nothing scored', () => {
    const result = decide(answersFromMask(0));
    expect(result.recommendations).toEqual([FALLBACK]);
    expect(result.scores).toEqual({});
    expect(result.topPick).toBe(FALLBACK);
    expect(result.alsoConsider).toEqual([]);
    expect(result.rationale).toEqual([FALLBACK_RATIONALE]);
    expect(result.details).toEqual([
      'If none matched strongly, reassess objectives or explicitly combine methods (e.g., STRIDE + LINDDUN; PASTA + ATT&CK).'
    ]);
  });

  it('q1 only: STRIDE with base score', () => {
    const result = decide({ q1: 'yes' });
    expect(result.recommendations).toEqual(['STRIDE']);
    expect(result.scores).toEqual({ STRIDE: 3 });
    expect(result.topPick).toBe('STRIDE');
    expect(result.alsoConsider).toEqual([]);
  });

  it('q1 + CI/CD + DFD walk: STRIDE-per-DFD with bonus', () => {
    const result = decide({ q1: 'yes', q9: 'yes', l3_stride_dfd: 'yes', l3_stride_element: 'no' });
    expect(result.scores).toEqual({ STRIDE: 4 });
    expect(result.topPick).toBe('STRIDE-per-DFD');
    expect(result.recommendations).toEqual(['STRIDE-per-DFD', 'Threat modeling as code (CI/CD)']);
    expect(result.rationale).toEqual([
      'Q1: If yes, STRIDE maps cleanly to data-flow diagrams and design reviews.',
      'Q9: Keep the model as code next to the service so changes trigger review automatically.',
      'L3_STRIDE_DFD: Analyzing interactions across trust boundaries points to STRIDE-per-DFD.'
    ]);
  });

  it('q4 with both quantitative and org-wide sub-answers resolves to FAIR', () => {
    const result = decide({ q4: 'yes', l3_octavefair_quant: 'yes', l3_octavefair_orgwide: 'yes' });
    expect(result.recommendations).toEqual(['FAIR']);
    expect(result.topPick).toBe('FAIR');
    expect(result.details).toEqual(['Quantify risk as probable frequency and magnitude of financial loss.']);
  });

  it('STRIDE and PASTA with TTP and quantitative bonuses: PASTA wins', () => {
    const result = decide({ q1: 'yes', q3: 'yes', q11: 'yes', q10: 'yes' });
    expect(result.scores).toEqual({ STRIDE: 3, PASTA: 5 });
    expect(result.topPick).toBe('PASTA');
    expect(result.alsoConsider).toEqual(['STRIDE']);
    expect(result.recommendations).toEqual([
      'STRIDE',
      'PASTA',
      'Quantitative risk scoring',
      'ATT&CK detection coverage mapping'
    ]);
  });

  it('keeps scores keyed by the ambiguous label after resolution', () => {
    const result = decide({ q4: 'yes', q6: 'yes', q9: 'yes', l3_octavefair_orgwide: 'yes', l3_vastcards_ideation: 'yes' });
    expect(result.scores).toEqual({ 'OCTAVE or FAIR': 3, 'VAST or Security Cards': 4 });
    expect(result.topPick).toBe('Security Cards');
    expect(result.alsoConsider).toEqual(['OCTAVE']);
  });

  it('ranks equal scores by canonical priority', () => {
    const result = decide({ q6: 'yes', q1: 'yes', q9: 'yes' });
    expect(result.scores).toEqual({ 'STRIDE': 4, 'VAST or Security Cards': 4 });
    expect(result.topPick).toBe('STRIDE');
    expect(result.alsoConsider).toEqual(['VAST or Security Cards']);
  });

  it('echoes answers in declaration order', () => {
    const result = decide({ l3_stride_dfd: 'no', q9: 'yes', q1: 'yes' });
    expect(Object.keys(result.answers)).toEqual(['q1', 'q9', 'l3_stride_dfd']);
  });

  it('does not mutate the input answer set', () => {
    const answers = Object.freeze({ q2: 'yes' as const });
    expect(() => decide(answers)).not.toThrow();
    expect(answers).toEqual({ q2: 'yes' });
  });
});

describe('decide properties over every Tier-1/Tier-2 combination', () => {
  const refinements: readonly string[] = REFINEMENT_LABELS;

  it('holds candidate, ordering and score invariants', () => {
    for (let mask = 0; mask < 1 << TIER12_IDS.length; mask++) {
      const answers = answersFromMask(mask);
      const result = decide(answers);

      expect(result.recommendations.length).toBeGreaterThan(0);
      expect(new Set(result.recommendations).size).toBe(result.recommendations.length);
      expect(result.details).toHaveLength(result.recommendations.length);

      const firstRefinement = result.recommendations.findIndex(l => refinements.includes(l));
      if (firstRefinement >= 0) {
        expect(result.recommendations.slice(firstRefinement).every(l => refinements.includes(l))).toBe(true);
      }

      for (const [label, points] of Object.entries(result.scores)) {
        const bonus = (BONUSES[label] ?? []).filter(id => answers[id] === 'yes').length;
        expect(points).toBe(BASE + bonus);
      }

      if (result.topPick !== null && Object.keys(result.scores).length > 0) {
        const scored = Object.values(result.scores).filter((p): p is number => p !== undefined);
        const top = Math.max(...scored);
        expect(result.alsoConsider).toHaveLength(scored.length - 1);
        expect(Object.entries(result.scores).some(([, p]) => p === top)).toBe(true);
      }
    }
  });
});
