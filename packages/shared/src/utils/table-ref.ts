import type { TableRef } from '../types/ingestion.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Parse a `schema.table` destination identifier.
 * Returns null unless there are exactly two valid identifier parts.
 */
export function parseTableRef(name: string): TableRef | null {
  const parts = name.split('.');
  if (parts.length !== 2) return null;
  const [schema, table] = parts;
  if (!IDENTIFIER.test(schema) || !IDENTIFIER.test(table)) return null;
  return { schema, table };
}

export function isQualifiedTableName(name: string): boolean {
  return parseTableRef(name) !== null;
}

export function formatTableRef(ref: TableRef): string {
  return `${ref.schema}.${ref.table}`;
}
