import 'dotenv/config';
import type { OutputFormat } from './types';

function parseFormat(value: string | undefined): OutputFormat {
  return value === 'markdown' || value === 'json' ? value : 'text';
}

export const CFG = {
  DEFAULT_FORMAT: parseFormat(process.env.TM_FORMAT),
  NON_INTERACTIVE: process.env.TM_NON_INTERACTIVE === 'true', // unanswered questions become "no"
  DEBUG: process.env.TM_DEBUG === 'true',
  SAVE_DIR: process.env.TM_SAVE_DIR || '',

  // Scoring constants - fixed, not configurable
  BASE_SCORE: 3,
  BONUS_SCORE: 1,

  SCHEMA_VERSION: '1.0',
  ANSWERS_FILE_EXIT_CODE: 2, // distinct from commander's usage errors (1)
  INPUT_CLOSED_EXIT_CODE: 3
} as const;
