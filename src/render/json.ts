import { CFG } from '../config';
import { DecisionPayloadSchema, type DecisionPayload } from '../schemas/decision';
import type { DecisionResult } from '../types';

export function toPayload(result: DecisionResult): DecisionPayload {
  return DecisionPayloadSchema.parse({
    schema_version: CFG.SCHEMA_VERSION,
    answers: result.answers,
    recommendations: result.recommendations,
    details: result.details,
    rationale: result.rationale,
    scores: result.scores,
    top_pick: result.topPick,
    also_consider: result.alsoConsider
  });
}

export function renderJson(result: DecisionResult): string {
  return JSON.stringify(toPayload(result), null, 2);
}
