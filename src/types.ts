import type {
  PRIMARY_LABELS,
  REFINEMENT_LABELS,
  RESOLVED_LABELS,
  TIER1_IDS,
  TIER1_METHODS,
  TIER2_IDS,
  TIER3_IDS
} from './engine/tables';

export type YesNo = 'yes' | 'no';

export type Tier1Id = typeof TIER1_IDS[number];
export type Tier2Id = typeof TIER2_IDS[number];
export type Tier3Id = typeof TIER3_IDS[number];
export type QuestionId = Tier1Id | Tier2Id | Tier3Id;
export type Tier = 1 | 2 | 3;

export type PrimaryLabel = typeof PRIMARY_LABELS[number];
export type Tier1Method = typeof TIER1_METHODS[number];
export type RefinementLabel = typeof REFINEMENT_LABELS[number];
export type ResolvedLabel = typeof RESOLVED_LABELS[number];
export type MethodLabel = PrimaryLabel | RefinementLabel | ResolvedLabel;

export interface Question {
  id: QuestionId;
  tier: Tier;
  prompt: string;
  rationale: string;
  method?: Tier1Method; // Tier-3 only: the ambiguous method this question resolves
}

// Absent ids count as "no".
export type Answers = Readonly<Partial<Record<QuestionId, YesNo>>>;

export type Scores = Partial<Record<Tier1Method, number>>;

export interface Selection<L extends MethodLabel> {
  labels: L[];
  rationale: string[];
}

export interface DecisionResult {
  answers: Answers;
  recommendations: MethodLabel[];
  details: string[]; // parallel to recommendations
  rationale: string[];
  scores: Scores; // keyed by the ambiguous Tier-1 label, never resolved
  topPick: MethodLabel | null;
  alsoConsider: MethodLabel[];
}

export type OutputFormat = 'text' | 'markdown' | 'json';
