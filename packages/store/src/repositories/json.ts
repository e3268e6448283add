import { isRecord } from '@crewline/shared';

/** Decode a JSON column expected to hold an object. */
export function parseObjectColumn(text: string | null): Record<string, unknown> {
  if (!text) return {};
  const parsed: unknown = JSON.parse(text);
  return isRecord(parsed) ? parsed : {};
}
