import Database from 'better-sqlite3';
import * as path from 'node:path';
import * as fs from 'node:fs';

const DEFAULT_DB_PATH = '.crewline/crewline.db';

let instance: Database.Database | null = null;
let instancePath: string | null = null;

export interface DatabaseOptions {
  /** State database file, resolved against cwd. Defaults to .crewline/crewline.db */
  dbPath?: string;
}

/**
 * The process-wide state database: execution history, ingestion checkpoints
 * and persisted traces. Opened on first use; asking for a different file
 * while it is open is an error.
 */
export function getDatabase(options?: DatabaseOptions): Database.Database {
  const dbPath = path.resolve(options?.dbPath ?? DEFAULT_DB_PATH);

  if (instance) {
    if (options?.dbPath !== undefined && dbPath !== instancePath) {
      throw new Error(`State database already open at ${instancePath ?? 'unknown path'}, cannot open ${dbPath}`);
    }
    return instance;
  }

  ensureParentDir(dbPath);
  const db = new Database(dbPath);
  applyPragmas(db);

  instance = db;
  instancePath = dbPath;
  return db;
}

export function closeDatabase(): void {
  instance?.close();
  instance = null;
  instancePath = null;
}

/** Unshared in-memory state database, pragmas as in production. */
export function createTestDatabase(): Database.Database {
  const db = new Database(':memory:');
  applyPragmas(db);
  return db;
}

/** Tests only: drop the reference without closing. */
export function _resetSingleton(): void {
  instance = null;
  instancePath = null;
}

export function ensureParentDir(filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
}

/** Applied to the state database and to every warehouse file. */
export function applyPragmas(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');
  db.pragma('temp_store = MEMORY');
}
