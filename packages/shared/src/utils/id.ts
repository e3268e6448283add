import { randomBytes } from 'node:crypto';

/** Sortable, prefixed identifier, e.g. `run_lx3k9a2f1c9e4b7d`. */
export function generateId(prefix: string): string {
  return `${prefix}_${Date.now().toString(36)}${randomBytes(6).toString('hex')}`;
}
