import { CFG } from '../config';

// stdout is reserved for the rendered result
export function log(label: string, ...args: unknown[]) {
  if (!CFG.DEBUG) return;
  console.error(`[TM] ${label}`, ...args);
}

export function warn(message: string, ...args: unknown[]) {
  console.error(`[TM] WARN ${message}`, ...args);
}
