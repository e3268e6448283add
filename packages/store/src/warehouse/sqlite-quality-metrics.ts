import type {
  QualityCheckName,
  QualityCheckResult,
  QualityMeasureOptions,
  QualityMetrics,
  TableRef,
} from '@crewline/shared';
import { CrewlineError, formatTableRef } from '@crewline/shared';
import type { SqliteConnection, SqliteStorage } from './sqlite-storage.js';
import { quoteIdent } from './sql.js';

/** Completeness and uniqueness measured with SQL over a warehouse table. */
export class SqliteQualityMetrics implements QualityMetrics {
  constructor(private readonly storage: SqliteStorage) {}

  async measure(
    check: QualityCheckName,
    ref: TableRef,
    options: QualityMeasureOptions = {},
  ): Promise<QualityCheckResult> {
    const conn = await this.storage.connect();
    try {
      const columns = conn.columns(ref);
      if (columns.length === 0) {
        throw new CrewlineError(`Table not found: ${formatTableRef(ref)}`);
      }
      return check === 'completeness'
        ? completeness(conn, ref, columns)
        : uniqueness(conn, ref, options.keyColumn ?? columns[0], columns);
    } finally {
      await conn.close();
    }
  }
}

/** Share of non-null cells across every column. */
function completeness(conn: SqliteConnection, ref: TableRef, columns: string[]): QualityCheckResult {
  const nonNull = columns
    .map(c => `SUM(CASE WHEN ${quoteIdent(c)} IS NOT NULL THEN 1 ELSE 0 END)`)
    .join(' + ');
  const row = conn.db
    .prepare<[], { total_rows: number; non_null: number | null }>(
      `SELECT COUNT(*) AS total_rows, ${nonNull} AS non_null FROM ${qualified(ref)}`,
    )
    .get();

  const totalRows = row?.total_rows ?? 0;
  const nonNullCells = row?.non_null ?? 0;
  const totalCells = totalRows * columns.length;

  return {
    check: 'completeness',
    score: totalCells === 0 ? 0 : nonNullCells / totalCells,
    details: { total_rows: totalRows, columns: columns.length, non_null_cells: nonNullCells },
  };
}

/** Distinct key values over row count. */
function uniqueness(
  conn: SqliteConnection,
  ref: TableRef,
  keyColumn: string,
  columns: string[],
): QualityCheckResult {
  if (!columns.includes(keyColumn)) {
    throw new CrewlineError(`Key column ${keyColumn} not found in ${formatTableRef(ref)}`);
  }
  const row = conn.db
    .prepare<[], { total_rows: number; unique_values: number }>(
      `SELECT COUNT(*) AS total_rows, COUNT(DISTINCT ${quoteIdent(keyColumn)}) AS unique_values FROM ${qualified(ref)}`,
    )
    .get();

  const totalRows = row?.total_rows ?? 0;
  const uniqueValues = row?.unique_values ?? 0;

  return {
    check: 'uniqueness',
    score: totalRows === 0 ? 0 : uniqueValues / totalRows,
    details: { total_rows: totalRows, unique_values: uniqueValues, key_column: keyColumn },
  };
}

function qualified(ref: TableRef): string {
  return `${quoteIdent(ref.schema)}.${quoteIdent(ref.table)}`;
}
