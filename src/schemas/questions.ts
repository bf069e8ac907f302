import { z } from 'zod';
import { ALL_LABELS, TIER1_IDS, TIER1_METHODS, TIER2_IDS, TIER3_IDS } from '../engine/tables';

const QuestionTextSchema = z.object({
  prompt: z.string().min(8),
  rationale: z.string().min(8)
});

function inOrder(expected: readonly string[]) {
  return (entries: { id: string }[]) =>
    entries.length === expected.length && entries.every((e, i) => e.id === expected[i]);
}

export const QuestionBankSchema = z.object({
  tier1: z.array(QuestionTextSchema.extend({ id: z.enum(TIER1_IDS) }))
    .refine(inOrder(TIER1_IDS), { message: `tier1 must list ${TIER1_IDS.join(', ')} in order` }),
  tier2: z.array(QuestionTextSchema.extend({ id: z.enum(TIER2_IDS) }))
    .refine(inOrder(TIER2_IDS), { message: `tier2 must list ${TIER2_IDS.join(', ')} in order` }),
  tier3: z.array(QuestionTextSchema.extend({ id: z.enum(TIER3_IDS), method: z.enum(TIER1_METHODS) }))
    .refine(inOrder(TIER3_IDS), { message: 'tier3 must list every resolution question once, in order' })
});

export const DetailTableSchema = z.record(z.string(), z.string().min(1)).superRefine((table, ctx) => {
  for (const label of ALL_LABELS) {
    if (!table[label]) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing detail for "${label}"` });
    }
  }
});
