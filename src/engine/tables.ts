import type {
  MethodLabel,
  RefinementLabel,
  ResolvedLabel,
  Tier1Id,
  Tier1Method,
  Tier2Id,
  Tier3Id
} from '../types';

export const TIER1_IDS = ['q1', 'q2', 'q3', 'q4', 'q5', 'q6'] as const;
export const TIER2_IDS = ['q7', 'q8', 'q9', 'q10', 'q11', 'q12'] as const;
export const TIER3_IDS = [
  'l3_stride_dfd',
  'l3_stride_element',
  'l3_linddun_dpia',
  'l3_linddun_eng',
  'l3_pasta_full',
  'l3_pasta_light',
  'l3_octavefair_quant',
  'l3_octavefair_orgwide',
  'l3_attack_detection',
  'l3_attack_design',
  'l3_attack_catalog',
  'l3_vastcards_scale',
  'l3_vastcards_ideation'
] as const;

export const QUESTION_IDS = [...TIER1_IDS, ...TIER2_IDS, ...TIER3_IDS] as const;

export const FALLBACK_LABEL = 'Reconsider scope / combine methods';

export const TIER1_METHODS = [
  'STRIDE',
  'LINDDUN',
  'PASTA',
  'OCTAVE or FAIR',
  'Attack Trees + MITRE ATT&CK + CAPEC',
  'VAST or Security Cards'
] as const;

// Canonical priority order, also used as the score tie-break.
export const PRIMARY_LABELS = [...TIER1_METHODS, FALLBACK_LABEL] as const;

export const REFINEMENT_LABELS = [
  'Compliance control mapping',
  'Supply-chain threat library',
  'Threat modeling as code (CI/CD)',
  'Quantitative risk scoring',
  'ATT&CK detection coverage mapping',
  'AI/ML threat extensions (MITRE ATLAS)'
] as const;

export const RESOLVED_LABELS = [
  'STRIDE-per-DFD',
  'STRIDE-per-Element',
  'LINDDUN (DPIA)',
  'LINDDUN (engineering)',
  'PASTA (full)',
  'PASTA (light)',
  'FAIR',
  'OCTAVE',
  'MITRE ATT&CK (detection mapping)',
  'Attack Trees (design analysis)',
  'CAPEC (attack pattern catalog)',
  'VAST',
  'Security Cards'
] as const;

export const PRIMARY_BY_QUESTION: Readonly<Record<Tier1Id, Tier1Method>> = {
  q1: 'STRIDE',
  q2: 'LINDDUN',
  q3: 'PASTA',
  q4: 'OCTAVE or FAIR',
  q5: 'Attack Trees + MITRE ATT&CK + CAPEC',
  q6: 'VAST or Security Cards'
};

export const REFINEMENTS_BY_QUESTION: Readonly<Record<Tier2Id, readonly RefinementLabel[]>> = {
  q7: ['Compliance control mapping'],
  q8: ['Supply-chain threat library'],
  q9: ['Threat modeling as code (CI/CD)'],
  q10: ['Quantitative risk scoring'],
  q11: ['ATT&CK detection coverage mapping'],
  q12: ['AI/ML threat extensions (MITRE ATLAS)']
};

export interface ScoreBonus {
  method: Tier1Method;
  when: Tier2Id;
}

// Each entry is worth CFG.BONUS_SCORE when the Tier-2 answer is "yes".
export const SCORE_BONUSES: readonly ScoreBonus[] = [
  { method: 'STRIDE', when: 'q9' },
  { method: 'LINDDUN', when: 'q7' },
  { method: 'PASTA', when: 'q11' },
  { method: 'PASTA', when: 'q10' },
  { method: 'OCTAVE or FAIR', when: 'q10' },
  { method: 'OCTAVE or FAIR', when: 'q7' },
  { method: 'Attack Trees + MITRE ATT&CK + CAPEC', when: 'q11' },
  { method: 'VAST or Security Cards', when: 'q9' }
];

export interface ResolutionVariant {
  question: Tier3Id;
  label: ResolvedLabel;
}

/**
 * Variants per ambiguous method, in preference order: the first variant whose
 * question was answered "yes" wins. The fallback label has no entry.
 */
export const RESOLUTION_RULES: Readonly<Record<Tier1Method, readonly ResolutionVariant[]>> = {
  'STRIDE': [
    { question: 'l3_stride_dfd', label: 'STRIDE-per-DFD' },
    { question: 'l3_stride_element', label: 'STRIDE-per-Element' }
  ],
  'LINDDUN': [
    { question: 'l3_linddun_dpia', label: 'LINDDUN (DPIA)' },
    { question: 'l3_linddun_eng', label: 'LINDDUN (engineering)' }
  ],
  'PASTA': [
    { question: 'l3_pasta_full', label: 'PASTA (full)' },
    { question: 'l3_pasta_light', label: 'PASTA (light)' }
  ],
  'OCTAVE or FAIR': [
    { question: 'l3_octavefair_quant', label: 'FAIR' },
    { question: 'l3_octavefair_orgwide', label: 'OCTAVE' }
  ],
  'Attack Trees + MITRE ATT&CK + CAPEC': [
    { question: 'l3_attack_detection', label: 'MITRE ATT&CK (detection mapping)' },
    { question: 'l3_attack_design', label: 'Attack Trees (design analysis)' },
    { question: 'l3_attack_catalog', label: 'CAPEC (attack pattern catalog)' }
  ],
  'VAST or Security Cards': [
    { question: 'l3_vastcards_scale', label: 'VAST' },
    { question: 'l3_vastcards_ideation', label: 'Security Cards' }
  ]
};

export function isTier1Method(label: string): label is Tier1Method {
  return TIER1_METHODS.some(l => l === label);
}

export const ALL_LABELS: readonly MethodLabel[] = [...PRIMARY_LABELS, ...REFINEMENT_LABELS, ...RESOLVED_LABELS];
