import type Database from 'better-sqlite3';

export interface Migration {
  version: number;
  name: string;
  up(db: Database.Database): void;
}

const CREATE_TRACKING_TABLE = `
  CREATE TABLE IF NOT EXISTS _migrations (
    version    INTEGER PRIMARY KEY,
    name       TEXT NOT NULL,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  )
`;

/**
 * Apply pending migrations in version order, each in its own transaction.
 * Returns the names of the migrations applied by this call.
 */
export function runMigrations(db: Database.Database, migrations: Migration[]): string[] {
  db.exec(CREATE_TRACKING_TABLE);

  const current = getCurrentVersion(db);
  const record = db.prepare<[number, string]>('INSERT INTO _migrations (version, name) VALUES (?, ?)');
  const applied: string[] = [];

  const pending = [...migrations]
    .filter(m => m.version > current)
    .sort((a, b) => a.version - b.version);

  for (const migration of pending) {
    db.transaction(() => {
      migration.up(db);
      record.run(migration.version, migration.name);
    })();
    applied.push(migration.name);
  }

  return applied;
}

/** Highest applied migration version, 0 on a database never migrated. */
export function getCurrentVersion(db: Database.Database): number {
  const tracked = db
    .prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM sqlite_master WHERE type = 'table' AND name = '_migrations'")
    .get();
  if (!tracked || tracked.n === 0) return 0;

  const row = db.prepare<[], { v: number }>('SELECT COALESCE(MAX(version), 0) AS v FROM _migrations').get();
  return row?.v ?? 0;
}
