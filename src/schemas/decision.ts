import { z } from 'zod';
import { ALL_LABELS, QUESTION_IDS, TIER1_METHODS } from '../engine/tables';

const LabelSchema = z.string().refine(l => ALL_LABELS.some(known => known === l), {
  message: 'Unknown method label'
});

export const DecisionPayloadSchema = z.object({
  schema_version: z.literal('1.0'),
  answers: z.record(z.enum(QUESTION_IDS), z.enum(['yes', 'no'])),
  recommendations: z.array(LabelSchema).min(1),
  details: z.array(z.string()),
  rationale: z.array(z.string()),
  scores: z.record(z.enum(TIER1_METHODS), z.number().int().nonnegative()),
  top_pick: LabelSchema.nullable(),
  also_consider: z.array(LabelSchema)
}).refine(p => p.details.length === p.recommendations.length, {
  message: 'details must be parallel to recommendations'
});

export type DecisionPayload = z.infer<typeof DecisionPayloadSchema>;
