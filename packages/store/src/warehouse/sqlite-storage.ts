import Database from 'better-sqlite3';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { CsvRecord, Storage, StorageConnection, TableRef } from '@crewline/shared';
import { BatchInsertError, ConnectionError, errorMessage, formatTableRef } from '@crewline/shared';
import { applyPragmas } from '../database.js';
import { quoteIdent } from './sql.js';

export interface SqliteStorageOptions {
  /**
   * Directory holding one database file per schema (`<schema>.db`).
   * Ignored when a shared database is given.
   */
  warehousePath?: string;
  /**
   * Use this open database instead of opening files. Schemas are attached
   * in memory and the database is left open on close.
   */
  database?: Database.Database;
}

/**
 * Warehouse destination backed by SQLite. Every `schema.table` maps to a
 * table inside the database attached under the schema's name.
 */
export class SqliteStorage implements Storage {
  constructor(private readonly options: SqliteStorageOptions) {}

  async connect(): Promise<SqliteConnection> {
    if (this.options.database) {
      return new SqliteConnection(this.options.database, null, false);
    }

    const dir = this.options.warehousePath;
    if (!dir) {
      throw new ConnectionError('no warehouse path configured');
    }
    try {
      fs.mkdirSync(dir, { recursive: true });
      const db = new Database(path.join(dir, 'main.db'));
      applyPragmas(db);
      return new SqliteConnection(db, dir, true);
    } catch (err) {
      throw new ConnectionError(`cannot open warehouse at ${dir}: ${errorMessage(err)}`, { cause: err });
    }
  }
}

export class SqliteConnection implements StorageConnection {
  private readonly insertCache = new Map<string, Database.Statement<unknown[]>>();

  constructor(
    readonly db: Database.Database,
    private readonly dir: string | null,
    private readonly owned: boolean,
  ) {}

  /** Attach the schema's database unless it is already visible. */
  attach(schema: string): void {
    if (schema === 'main' || schema === 'temp') return;

    const attached = this.db
      .prepare<[], { name: string }>('PRAGMA database_list')
      .all()
      .some(row => row.name === schema);
    if (attached) return;

    const file = this.dir ? path.join(this.dir, `${schema}.db`) : ':memory:';
    this.db.prepare<[string]>(`ATTACH DATABASE ? AS ${quoteIdent(schema)}`).run(file);
  }

  /** Column names of an existing table, empty when the table is absent. */
  columns(ref: TableRef): string[] {
    this.attach(ref.schema);
    return this.db
      .prepare<[], { name: string }>(`PRAGMA ${quoteIdent(ref.schema)}.table_info(${quoteIdent(ref.table)})`)
      .all()
      .map(row => row.name);
  }

  async insertBatch(ref: TableRef, rows: CsvRecord[]): Promise<void> {
    if (rows.length === 0) return;
    const target = formatTableRef(ref);

    try {
      const columns = this.ensureTable(ref, Object.keys(rows[0]));
      const insert = this.insertStatement(ref, columns);
      const insertAll = this.db.transaction((batch: CsvRecord[]) => {
        for (const row of batch) {
          // Empty CSV fields land as NULL
          insert.run(...columns.map(c => (row[c] === undefined || row[c] === '' ? null : row[c])));
        }
      });
      insertAll(rows);
    } catch (err) {
      throw new BatchInsertError(target, rows.length, { cause: err });
    }
  }

  async close(): Promise<void> {
    this.insertCache.clear();
    if (this.owned && this.db.open) {
      this.db.close();
    }
  }

  private ensureTable(ref: TableRef, header: string[]): string[] {
    const existing = this.columns(ref);
    if (existing.length > 0) return existing;

    const defs = header.map(quoteIdent).join(', ');
    this.db.exec(`CREATE TABLE IF NOT EXISTS ${quoteIdent(ref.schema)}.${quoteIdent(ref.table)} (${defs})`);
    return header;
  }

  private insertStatement(ref: TableRef, columns: string[]): Database.Statement<unknown[]> {
    const key = `${formatTableRef(ref)}|${columns.join(',')}`;
    const cached = this.insertCache.get(key);
    if (cached) return cached;

    const stmt = this.db.prepare<unknown[]>(
      `INSERT INTO ${quoteIdent(ref.schema)}.${quoteIdent(ref.table)} (${columns.map(quoteIdent).join(', ')}) ` +
        `VALUES (${columns.map(() => '?').join(', ')})`,
    );
    this.insertCache.set(key, stmt);
    return stmt;
  }
}
