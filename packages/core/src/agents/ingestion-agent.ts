import {
  DEFAULT_BACKOFF_BASE_MS,
  DEFAULT_BATCH_SIZE,
  DEFAULT_MAX_RETRIES,
  errorMessage,
  formatTableRef,
  ingestionInputSchema,
  parseTableRef,
  type AgentRunOptions,
  type CheckpointStore,
  type CoreOutcome,
  type FileAccess,
  type IngestionInput,
  type IngestionSummary,
  type Storage,
} from '@crewline/shared';
import { Agent, type AgentOptions } from '../agent.js';
import { fail, succeed } from '../outcome.js';
import { connectWithRetry, type Sleeper } from '../retry.js';

export interface IngestionAgentDeps {
  storage: Storage;
  files: FileAccess;
  checkpoints: CheckpointStore;
}

export interface IngestionSettings {
  batchSize: number;
  maxRetries: number;
  backoffBaseMs: number;
  sleep?: Sleeper;
}

/**
 * Loads a CSV file into a `schema.table` destination in transactional
 * batches. With a checkpoint id, progress is saved after every committed
 * batch and a later run resumes after the last saved row.
 */
export class IngestionAgent extends Agent<IngestionInput, IngestionSummary> {
  protected readonly inputSchema = ingestionInputSchema;
  private readonly settings: IngestionSettings;

  constructor(
    private readonly deps: IngestionAgentDeps,
    settings: Partial<IngestionSettings> = {},
    options: AgentOptions = {},
  ) {
    super('ingestion', 'Loads CSV data into the warehouse in checkpointed batches', options);
    this.settings = {
      batchSize: settings.batchSize ?? DEFAULT_BATCH_SIZE,
      maxRetries: settings.maxRetries ?? DEFAULT_MAX_RETRIES,
      backoffBaseMs: settings.backoffBaseMs ?? DEFAULT_BACKOFF_BASE_MS,
      sleep: settings.sleep,
    };
  }

  protected override async checkPreconditions(input: IngestionInput): Promise<string[]> {
    const { files } = this.deps;
    if (!(await files.exists(input.source_file))) {
      return [`Source file not found: ${input.source_file}`];
    }
    if (!(await files.isFile(input.source_file))) {
      return [`Source is not a regular file: ${input.source_file}`];
    }
    return [];
  }

  protected async runCore(
    input: IngestionInput,
    { traceId }: AgentRunOptions,
  ): Promise<CoreOutcome<IngestionSummary>> {
    const target = parseTableRef(input.target_table);
    if (!target) {
      return fail(`target_table must include schema (e.g., raw.icustays)`);
    }

    const { storage, files, checkpoints } = this.deps;
    const batchSize = input.batch_size ?? this.settings.batchSize;
    const checkpointId = input.checkpoint_file;

    const totalRows = await files.countCsvRows(input.source_file);
    const offset = checkpointId ? (await checkpoints.load(checkpointId))?.lastProcessedRow ?? 0 : 0;

    let rowsIngested = 0;
    let rowsFailed = 0;
    let batches = 0;

    const summary = (): IngestionSummary => ({
      source_file: input.source_file,
      target_table: formatTableRef(target),
      total_rows: totalRows,
      rows_ingested: rowsIngested,
      rows_failed: rowsFailed,
      success_rate: totalRows === 0 ? 0 : rowsIngested / totalRows,
      resumed_from: offset,
      batches,
    });

    if (offset >= totalRows) {
      this.trace(traceId, 'info', { message: 'Nothing to ingest', totalRows, offset });
      return succeed(summary(), { rows_ingested: 0, rows_failed: 0, batches: 0 });
    }

    const conn = await connectWithRetry(() => storage.connect(), {
      maxRetries: this.settings.maxRetries,
      backoffBaseMs: this.settings.backoffBaseMs,
      sleep: this.settings.sleep,
      onRetry: (attempt, delayMs, err) => {
        this.trace(traceId, 'connection_retry', { attempt: attempt + 1, delayMs, message: err.message });
      },
    });

    try {
      for await (const batch of files.readCsvBatches(input.source_file, { batchSize, skipRows: offset })) {
        batches++;
        try {
          await conn.insertBatch(target, batch);
        } catch (err) {
          rowsFailed += batch.length;
          this.trace(traceId, 'batch_failed', { batch: batches, rows: batch.length, message: errorMessage(err) });
          continue;
        }

        rowsIngested += batch.length;
        this.trace(traceId, 'batch_committed', { batch: batches, rows: batch.length });

        if (checkpointId) {
          const lastProcessedRow = offset + rowsIngested;
          await checkpoints.save(checkpointId, { lastProcessedRow });
          this.trace(traceId, 'checkpoint_saved', { checkpoint: checkpointId, lastProcessedRow });
        }
      }
    } finally {
      await conn.close();
    }

    return succeed(summary(), { rows_ingested: rowsIngested, rows_failed: rowsFailed, batches });
  }
}
