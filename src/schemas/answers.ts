import { z } from 'zod';

// Values are checked per known question id, after unknown ids are dropped.
export const RawAnswersSchema = z.record(z.string(), z.unknown());

// Before normalization: yes/no tokens, booleans, or the numbers 0 and 1.
export const AnswerValueSchema = z.union([z.string(), z.boolean(), z.literal(0), z.literal(1)]);

// A previously saved decision payload can be replayed as an answers file.
export const SavedDecisionSchema = z.object({
  schema_version: z.string(),
  answers: RawAnswersSchema
});

export type RawAnswers = z.infer<typeof RawAnswersSchema>;
