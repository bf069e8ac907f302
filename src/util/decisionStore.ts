import { mkdirSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import type { DecisionPayload } from '../schemas/decision';

export const DECISION_FILE = 'decision.json';

/** Writes the payload to <dir>/decision.json, replacing an earlier run. Returns the path. */
export function saveDecision(dir: string, payload: DecisionPayload): string {
  const file = path.join(dir, DECISION_FILE);
  mkdirSync(dir, { recursive: true });
  writeFileSync(file, `${JSON.stringify(payload, null, 2)}\n`, 'utf-8');
  return file;
}
