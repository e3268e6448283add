import { describe, it, expect, beforeEach } from 'vitest';
import type Database from 'better-sqlite3';
import { createTestDatabase } from '../src/database.js';
import { SqliteStorage } from '../src/warehouse/sqlite-storage.js';
import { SqliteQualityMetrics } from '../src/warehouse/sqlite-quality-metrics.js';

const stays = { schema: 'analytics', table: 'stays' };

let db: Database.Database;
let metrics: SqliteQualityMetrics;

beforeEach(async () => {
  db = createTestDatabase();
  const storage = new SqliteStorage({ database: db });
  metrics = new SqliteQualityMetrics(storage);

  const conn = await storage.connect();
  await conn.insertBatch(stays, [
    { id: '1', ward: 'icu', los: '' },
    { id: '2', ward: '', los: '3' },
    { id: '2', ward: 'er', los: '4' },
    { id: '3', ward: 'icu', los: '1' },
  ]);
});

describe('SqliteQualityMetrics', () => {
  it('scores completeness as the share of non-null cells', async () => {
    const result = await metrics.measure('completeness', stays);

    expect(result.check).toBe('completeness');
    expect(result.score).toBeCloseTo(10 / 12);
    expect(result.details).toEqual({ total_rows: 4, columns: 3, non_null_cells: 10 });
  });

  it('scores uniqueness on the first column by default', async () => {
    const result = await metrics.measure('uniqueness', stays);

    expect(result.score).toBe(0.75);
    expect(result.details).toEqual({ total_rows: 4, unique_values: 3, key_column: 'id' });
  });

  it('uses the given key column', async () => {
    const result = await metrics.measure('uniqueness', stays, { keyColumn: 'los' });
    expect(result.details.unique_values).toBe(3);
  });

  it('rejects an unknown key column', async () => {
    await expect(metrics.measure('uniqueness', stays, { keyColumn: 'nope' }))
      .rejects.toThrow('Key column nope not found in analytics.stays');
  });

  it('rejects a missing table', async () => {
    await expect(metrics.measure('completeness', { schema: 'analytics', table: 'missing' }))
      .rejects.toThrow('Table not found: analytics.missing');
  });

  it('scores an empty table as 0', async () => {
    db.exec('CREATE TABLE "analytics"."empty" (id)');
    const empty = { schema: 'analytics', table: 'empty' };

    expect((await metrics.measure('completeness', empty)).score).toBe(0);
    expect((await metrics.measure('uniqueness', empty)).score).toBe(0);
  });
});
