import type { AgentExecutionEntry } from './agent.js';
import type {
  CheckpointState,
  CsvRecord,
  QualityCheckName,
  QualityCheckResult,
  TableRef,
} from './ingestion.js';

// Collaborators injected into agents at construction time.

/** An open destination connection, owned by one ingestion call. */
export interface StorageConnection {
  /** Insert every row as one transaction. Nothing is committed if it throws. */
  insertBatch(table: TableRef, rows: CsvRecord[]): Promise<void>;
  close(): Promise<void>;
}

export interface Storage {
  /** Open a connection. Throws ConnectionError when the destination is unreachable. */
  connect(): Promise<StorageConnection>;
}

export interface CsvBatchOptions {
  batchSize: number;
  /** Data rows (header excluded) to skip before the first batch */
  skipRows?: number;
}

export interface FileAccess {
  exists(path: string): Promise<boolean>;
  /** True only for a regular file, not a directory */
  isFile(path: string): Promise<boolean>;
  readJson(path: string): Promise<unknown>;
  writeJson(path: string, data: unknown): Promise<void>;
  /** Returns true when a file was removed */
  remove(path: string): Promise<boolean>;
  /** Data records in a CSV file, header excluded */
  countCsvRows(path: string): Promise<number>;
  readCsvBatches(path: string, options: CsvBatchOptions): AsyncIterable<CsvRecord[]>;
}

/** Single-writer durable slot per checkpoint id. */
export interface CheckpointStore {
  load(id: string): Promise<CheckpointState | null>;
  save(id: string, state: CheckpointState): Promise<void>;
  /** Returns true when a checkpoint existed */
  clear(id: string): Promise<boolean>;
}

export interface QualityMeasureOptions {
  keyColumn?: string;
}

export interface QualityMetrics {
  measure(check: QualityCheckName, table: TableRef, options?: QualityMeasureOptions): Promise<QualityCheckResult>;
}

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface ProcessRunOptions {
  cwd?: string;
  env?: Record<string, string>;
}

/** Runs an external tool to completion, capturing its output. */
export interface ProcessRunner {
  run(command: string, args: string[], options?: ProcessRunOptions): Promise<ProcessResult>;
}

/** Receives every execution result of an agent. */
export interface ExecutionSink {
  append(entry: AgentExecutionEntry): void | Promise<void>;
}
