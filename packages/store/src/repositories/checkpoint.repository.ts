import type Database from 'better-sqlite3';
import type { CheckpointState, CheckpointStore } from '@crewline/shared';

interface CheckpointRow {
  id: string;
  last_row: number;
  updated_at: string;
}

export interface CheckpointListEntry {
  id: string;
  lastProcessedRow: number;
  updatedAt: string;
}

/** Checkpoints kept in the state database, one row per checkpoint id. */
export class SqliteCheckpointStore implements CheckpointStore {
  private getStmt: Database.Statement<[string], CheckpointRow>;
  private upsertStmt: Database.Statement<[{ id: string; last_row: number }]>;
  private deleteStmt: Database.Statement<[string]>;
  private listStmt: Database.Statement<[], CheckpointRow>;

  constructor(db: Database.Database) {
    this.getStmt = db.prepare<[string], CheckpointRow>('SELECT * FROM checkpoints WHERE id = ?');
    this.upsertStmt = db.prepare<[{ id: string; last_row: number }]>(`
      INSERT INTO checkpoints (id, last_row, updated_at) VALUES (@id, @last_row, datetime('now'))
      ON CONFLICT(id) DO UPDATE SET last_row = excluded.last_row, updated_at = excluded.updated_at
    `);
    this.deleteStmt = db.prepare<[string]>('DELETE FROM checkpoints WHERE id = ?');
    this.listStmt = db.prepare<[], CheckpointRow>('SELECT * FROM checkpoints ORDER BY id ASC');
  }

  async load(id: string): Promise<CheckpointState | null> {
    const row = this.getStmt.get(id);
    return row ? { lastProcessedRow: row.last_row } : null;
  }

  async save(id: string, state: CheckpointState): Promise<void> {
    this.upsertStmt.run({ id, last_row: state.lastProcessedRow });
  }

  async clear(id: string): Promise<boolean> {
    return this.deleteStmt.run(id).changes > 0;
  }

  list(): CheckpointListEntry[] {
    return this.listStmt.all().map(row => ({
      id: row.id,
      lastProcessedRow: row.last_row,
      updatedAt: row.updated_at,
    }));
  }
}
