// ── Database & Migrations ────────────────────────────────────────
export { getDatabase, closeDatabase, createTestDatabase, _resetSingleton } from './database.js';
export type { DatabaseOptions } from './database.js';
export { runMigrations, getCurrentVersion } from './migrations.js';
export type { Migration } from './migrations.js';
export { allMigrations } from './migrations/index.js';

// ── Repositories ─────────────────────────────────────────────────
export { ExecutionRepository } from './repositories/execution.repository.js';
export type { ExecutionListOptions } from './repositories/execution.repository.js';

export { SqliteCheckpointStore } from './repositories/checkpoint.repository.js';
export type { CheckpointListEntry } from './repositories/checkpoint.repository.js';

export { TraceRepository } from './repositories/trace.repository.js';
export type { TraceSummary } from './repositories/trace.repository.js';

// ── Warehouse ────────────────────────────────────────────────────
export { SqliteStorage, SqliteConnection } from './warehouse/sqlite-storage.js';
export type { SqliteStorageOptions } from './warehouse/sqlite-storage.js';
export { SqliteQualityMetrics } from './warehouse/sqlite-quality-metrics.js';

// ── Store ────────────────────────────────────────────────────────

import type Database from 'better-sqlite3';
import { getDatabase } from './database.js';
import { runMigrations } from './migrations.js';
import { allMigrations } from './migrations/index.js';
import { ExecutionRepository } from './repositories/execution.repository.js';
import { SqliteCheckpointStore } from './repositories/checkpoint.repository.js';
import { TraceRepository } from './repositories/trace.repository.js';

export interface CrewlineStore {
  db: Database.Database;
  executions: ExecutionRepository;
  checkpoints: SqliteCheckpointStore;
  traces: TraceRepository;
}

/**
 * Open (or create) the state database, run migrations, and return the
 * repositories.
 *
 * @param dbPath - SQLite file; defaults to `.crewline/crewline.db`.
 */
export function initializeStore(dbPath?: string): CrewlineStore {
  const db = getDatabase(dbPath ? { dbPath } : undefined);
  runMigrations(db, allMigrations);
  return storeFor(db);
}

/** Repositories over an already migrated database. */
export function storeFor(db: Database.Database): CrewlineStore {
  return {
    db,
    executions: new ExecutionRepository(db),
    checkpoints: new SqliteCheckpointStore(db),
    traces: new TraceRepository(db),
  };
}
