import rawDetails from '../data/details.json';
import { DetailTableSchema } from '../schemas/questions';
import { warn } from '../util/logger';
import type { MethodLabel } from '../types';

const DETAILS: Readonly<Record<string, string>> = DetailTableSchema.parse(rawDetails);

export function detailFor(label: MethodLabel): string {
  const detail = DETAILS[label];
  if (detail === undefined) {
    // data-table bug, not a user error
    warn(`No detail entry for "${label}"`);
    return '';
  }
  return detail;
}
