/** A two-part destination identifier, e.g. `raw.icustays`. */
export interface TableRef {
  schema: string;
  table: string;
}

/** One parsed CSV data record, keyed by header column. */
export type CsvRecord = Record<string, string>;

/** Durable ingestion progress marker. */
export interface CheckpointState {
  /** Number of data rows (header excluded) already committed */
  lastProcessedRow: number;
}

/** Summary returned by the ingestion agent. */
export interface IngestionSummary {
  source_file: string;
  target_table: string;
  total_rows: number;
  rows_ingested: number;
  rows_failed: number;
  /** rows_ingested / total_rows, 0 when the source has no data rows */
  success_rate: number;
  /** Offset the run resumed from (0 for a fresh run) */
  resumed_from: number;
  /** Batches attempted, committed or not */
  batches: number;
}

export type QualityCheckName = 'completeness' | 'uniqueness';

export interface QualityCheckResult {
  check: QualityCheckName;
  /** 0.0–1.0 */
  score: number;
  details: Record<string, number | string | null>;
}

export interface QualityReport {
  table_name: string;
  checks: Partial<Record<QualityCheckName, QualityCheckResult>>;
  overall_score: number;
  passed: boolean;
}

export interface TransformationOutput {
  command: string;
  success: boolean;
  stdout: string;
  stderr: string;
  return_code: number;
  models: string[];
}
