import type { YesNo } from '../types';

const YES_TOKENS = new Set(['y', 'yes', 'true', 't', '1']);
const NO_TOKENS = new Set(['n', 'no', 'false', 'f', '0']);

/**
 * Single gate for every answer source (prompt, flags, answers file).
 * Returns null for anything that is not a recognised yes/no token; callers
 * must re-prompt or reject, never coerce to "no".
 */
export function normalizeAnswer(raw: string): YesNo | null {
  const token = raw.trim().toLowerCase();
  if (YES_TOKENS.has(token)) return 'yes';
  if (NO_TOKENS.has(token)) return 'no';
  return null;
}

export function isYes(value: YesNo | undefined): boolean {
  return value === 'yes';
}
