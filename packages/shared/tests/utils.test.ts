import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  BatchInsertError,
  ConnectionError,
  CrewlineError,
  errorMessage,
  formatIssues,
  formatTableRef,
  generateId,
  isQualifiedTableName,
  isRecord,
  numberField,
  parseTableRef,
} from '../src/index.js';

describe('table references', () => {
  it('parses schema.table names', () => {
    expect(parseTableRef('raw.icustays')).toEqual({ schema: 'raw', table: 'icustays' });
    expect(formatTableRef({ schema: 'staging', table: 'events_2024' })).toBe('staging.events_2024');
  });

  it('rejects names without exactly one dot or with bad identifiers', () => {
    expect(parseTableRef('icustays')).toBeNull();
    expect(parseTableRef('a.b.c')).toBeNull();
    expect(parseTableRef('raw.')).toBeNull();
    expect(parseTableRef('raw.9lives')).toBeNull();
    expect(isQualifiedTableName('raw."x"')).toBe(false);
    expect(isQualifiedTableName('_raw.t1')).toBe(true);
  });
});

describe('formatIssues', () => {
  const schema = z.object({
    name: z.string(),
    size: z.number().int().positive(),
    table: z.string().refine(v => v.includes('.'), { message: 'table must include schema' }),
  });

  it('reports missing fields, typed problems and custom messages', () => {
    const parsed = schema.safeParse({ size: -1, table: 'plain' });
    expect(parsed.success).toBe(false);
    if (parsed.success) return;

    expect(formatIssues(parsed.error.issues)).toEqual([
      'Missing required field: name',
      'size: Number must be greater than 0',
      'table must include schema',
    ]);
  });
});

describe('guards', () => {
  it('recognizes plain objects only', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('x')).toBe(false);
  });

  it('reads finite numeric fields', () => {
    expect(numberField({ score: 0.5 }, 'score')).toBe(0.5);
    expect(numberField({ score: '0.5' }, 'score')).toBeUndefined();
    expect(numberField({ score: Number.NaN }, 'score')).toBeUndefined();
    expect(numberField(undefined, 'score')).toBeUndefined();
  });
});

describe('errors', () => {
  it('prefixes connection failures and keeps the cause', () => {
    const cause = new Error('ECONNREFUSED');
    const err = new ConnectionError('warehouse down', { cause });

    expect(err).toBeInstanceOf(CrewlineError);
    expect(err.message).toBe('Connection failed: warehouse down');
    expect(err.cause).toBe(cause);
  });

  it('describes failed batches with their size', () => {
    const err = new BatchInsertError('raw.events', 25, { cause: new Error('UNIQUE constraint failed') });
    expect(err.message).toBe('Batch insert into raw.events failed (25 rows): UNIQUE constraint failed');
  });

  it('extracts messages from any thrown value', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});

describe('generateId', () => {
  it('prefixes ids and does not repeat', () => {
    const a = generateId('run');
    const b = generateId('run');
    expect(a.startsWith('run_')).toBe(true);
    expect(a).not.toBe(b);
  });
});
