import { describe, it, expect, beforeEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { numberField, type CsvBatchOptions, type CsvRecord } from '@crewline/shared';
import { IngestionAgent } from '../src/agents/ingestion-agent.js';
import { LocalFileAccess } from '../src/tools/file-access.js';
import { TraceLogger } from '../src/trace-logger.js';
import { FakeStorage, MemoryCheckpoints, MemoryFiles, makeRows } from './fakes.js';

const SOURCE = 'data/patients.csv';
const CHECKPOINT = 'checkpoints/patients.json';

let files: MemoryFiles;
let checkpoints: MemoryCheckpoints;
let sleeps: number[];

beforeEach(() => {
  files = new MemoryFiles();
  files.csv.set(SOURCE, makeRows(100));
  checkpoints = new MemoryCheckpoints();
  sleeps = [];
});

function agentWith(storage: FakeStorage, tracer?: TraceLogger): IngestionAgent {
  return new IngestionAgent(
    { storage, files, checkpoints },
    { batchSize: 30, maxRetries: 3, backoffBaseMs: 1000, sleep: async ms => { sleeps.push(ms); } },
    { tracer },
  );
}


describe('IngestionAgent', () => {
  describe('batching and checkpoints', () => {
    it('ingests 100 rows in batches of 30/30/30/10 and checkpoints each commit', async () => {
      const storage = new FakeStorage();
      const result = await agentWith(storage).execute({
        source_file: SOURCE,
        target_table: 'raw.patients',
        checkpoint_file: CHECKPOINT,
      });

      expect(result.status).toBe('success');
      expect(storage.committed.map(b => b.length)).toEqual([30, 30, 30, 10]);
      expect(checkpoints.saves).toEqual([30, 60, 90, 100]);
      expect(result.output).toEqual({
        source_file: SOURCE,
        target_table: 'raw.patients',
        total_rows: 100,
        rows_ingested: 100,
        rows_failed: 0,
        success_rate: 1,
        resumed_from: 0,
        batches: 4,
      });
      expect(result.metrics).toEqual({ rows_ingested: 100, rows_failed: 0, batches: 4 });
    });

    it('resumes after the saved checkpoint', async () => {
      checkpoints.state.set(CHECKPOINT, 50);
      const storage = new FakeStorage();

      const result = await agentWith(storage).execute({
        source_file: SOURCE,
        target_table: 'raw.patients',
        checkpoint_file: CHECKPOINT,
      });

      expect(storage.committedRows).toBe(50);
      expect(storage.committed[0][0]).toEqual({ id: '51', value: 'v51' });
      expect(checkpoints.saves).toEqual([80, 100]);
      expect(checkpoints.state.get(CHECKPOINT)).toBe(100);
      expect(numberField(result.output, 'resumed_from')).toBe(50);
      expect(numberField(result.output, 'rows_ingested')).toBe(50);
    });

    it('is a no-op when the checkpoint covers the whole file', async () => {
      checkpoints.state.set(CHECKPOINT, 100);
      const storage = new FakeStorage();

      const result = await agentWith(storage).execute({
        source_file: SOURCE,
        target_table: 'raw.patients',
        checkpoint_file: CHECKPOINT,
      });

      expect(result.status).toBe('success');
      expect(numberField(result.output, 'rows_ingested')).toBe(0);
      expect(storage.connects).toBe(0);
      expect(files.batchReads).toBe(0);
      expect(checkpoints.saves).toEqual([]);
    });

    it('reports a zero success rate for a file without data rows', async () => {
      files.csv.set('empty.csv', []);
      const storage = new FakeStorage();

      const result = await agentWith(storage).execute({ source_file: 'empty.csv', target_table: 'raw.empty' });

      expect(numberField(result.output, 'total_rows')).toBe(0);
      expect(numberField(result.output, 'success_rate')).toBe(0);
      expect(storage.connects).toBe(0);
    });

    it('ingests without checkpointing when no checkpoint id is given', async () => {
      const storage = new FakeStorage();
      await agentWith(storage).execute({ source_file: SOURCE, target_table: 'raw.patients', batch_size: 40 });

      expect(storage.committed.map(b => b.length)).toEqual([40, 40, 20]);
      expect(checkpoints.saves).toEqual([]);
    });
  });

  describe('batch isolation', () => {
    it('counts a failed batch and keeps going', async () => {
      const storage = new FakeStorage({ failingInserts: [2] });

      const result = await agentWith(storage).execute({
        source_file: SOURCE,
        target_table: 'raw.patients',
        checkpoint_file: CHECKPOINT,
      });

      expect(result.status).toBe('success');
      expect(storage.committed.map(b => b[0].id)).toEqual(['1', '61', '91']);
      expect(checkpoints.saves).toEqual([30, 60, 70]);
      expect(result.metrics).toEqual({ rows_ingested: 70, rows_failed: 30, batches: 4 });
      expect(numberField(result.output, 'success_rate')).toBe(0.7);
      expect(storage.closes).toBe(1);
    });
  });

  describe('connection lifetime', () => {
    it('closes the connection when saving a checkpoint fails', async () => {
      class ReadOnlyCheckpoints extends MemoryCheckpoints {
        override async save(): Promise<void> {
          throw new Error('checkpoint volume is read-only');
        }
      }
      checkpoints = new ReadOnlyCheckpoints();
      const storage = new FakeStorage();

      const result = await agentWith(storage).execute({
        source_file: SOURCE,
        target_table: 'raw.patients',
        checkpoint_file: CHECKPOINT,
      });

      expect(result.status).toBe('failed');
      expect(result.errors).toEqual(['checkpoint volume is read-only']);
      expect(storage.committed.map(b => b.length)).toEqual([30]);
      expect(storage.closes).toBe(1);
    });

    it('closes the connection when the source breaks off mid-read', async () => {
      class TruncatedFiles extends MemoryFiles {
        override async *readCsvBatches(_path: string, options: CsvBatchOptions): AsyncIterable<CsvRecord[]> {
          yield makeRows(options.batchSize);
          throw new Error('unexpected end of stream');
        }
      }
      files = new TruncatedFiles();
      files.csv.set(SOURCE, makeRows(100));
      const storage = new FakeStorage();

      const result = await agentWith(storage).execute({
        source_file: SOURCE,
        target_table: 'raw.patients',
        checkpoint_file: CHECKPOINT,
      });

      expect(result.errors).toEqual(['unexpected end of stream']);
      expect(checkpoints.saves).toEqual([30]);
      expect(storage.connects).toBe(1);
      expect(storage.closes).toBe(1);
    });
  });

  describe('connection retry', () => {
    it('retries with 1s and 2s backoff before connecting', async () => {
      const storage = new FakeStorage({ connectFailures: 2 });

      const result = await agentWith(storage).execute({ source_file: SOURCE, target_table: 'raw.patients' });

      expect(result.status).toBe('success');
      expect(storage.connects).toBe(3);
      expect(sleeps).toEqual([1000, 2000]);
    });

    it('fails without touching the destination when retries are exhausted', async () => {
      const storage = new FakeStorage({ connectFailures: 3 });

      const result = await agentWith(storage).execute({
        source_file: SOURCE,
        target_table: 'raw.patients',
        checkpoint_file: CHECKPOINT,
      });

      expect(result.status).toBe('failed');
      expect(result.errors).toEqual(['Connection failed: warehouse down']);
      expect(sleeps).toEqual([1000, 2000]);
      expect(storage.committed).toEqual([]);
      expect(checkpoints.saves).toEqual([]);
    });

    it('does not retry a non-connection fault', async () => {
      const storage = new FakeStorage({ connectError: new Error('permission denied') });

      const result = await agentWith(storage).execute({ source_file: SOURCE, target_table: 'raw.patients' });

      expect(result.errors).toEqual(['permission denied']);
      expect(storage.connects).toBe(1);
      expect(sleeps).toEqual([]);
    });
  });

  describe('validation', () => {
    it('requires a schema-qualified target table', async () => {
      const storage = new FakeStorage();
      const result = await agentWith(storage).execute({ source_file: SOURCE, target_table: 'patients' });

      expect(result.errors).toEqual(['target_table must include schema (e.g., raw.icustays)']);
      expect(storage.connects).toBe(0);
    });

    it('reports missing fields', async () => {
      const result = await agentWith(new FakeStorage()).execute({ source_file: SOURCE });
      expect(result.errors).toEqual(['Missing required field: target_table']);
    });

    it('requires the source file to exist', async () => {
      const storage = new FakeStorage();
      const result = await agentWith(storage).execute({ source_file: 'missing.csv', target_table: 'raw.patients' });

      expect(result.errors).toEqual(['Source file not found: missing.csv']);
      expect(storage.connects).toBe(0);
    });

    it('rejects a directory given as the source', async () => {
      files.dirs.add('data');
      const storage = new FakeStorage();

      const result = await agentWith(storage).execute({ source_file: 'data', target_table: 'raw.patients' });

      expect(result.errors).toEqual(['Source is not a regular file: data']);
      expect(storage.connects).toBe(0);
    });
  });

  describe('local files', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'crewline-ingest-'));
    });

    it('reports a directory source as a validation failure', async () => {
      const storage = new FakeStorage();
      const agent = new IngestionAgent({ storage, files: new LocalFileAccess(), checkpoints }, { batchSize: 30 });

      const result = await agent.execute({ source_file: dir, target_table: 'raw.x' });

      expect(result.status).toBe('failed');
      expect(result.errors).toEqual([`Source is not a regular file: ${dir}`]);
      expect(storage.connects).toBe(0);
    });

    it('turns a read error into a failed result', async () => {
      class LenientFiles extends LocalFileAccess {
        override async isFile(): Promise<boolean> {
          return true;
        }
      }
      const storage = new FakeStorage();
      const agent = new IngestionAgent({ storage, files: new LenientFiles(), checkpoints }, { batchSize: 30 });

      const result = await agent.execute({ source_file: dir, target_table: 'raw.x' });

      expect(result.status).toBe('failed');
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toContain('EISDIR');
      expect(storage.connects).toBe(0);
    });
  });

  it('logs batch and checkpoint events when traced', async () => {
    const types: string[] = [];
    const tracer = new TraceLogger({ listener: event => { types.push(event.type); } });
    const traceId = tracer.createTrace('ingest');
    files.csv.set('small.csv', makeRows(40));

    await agentWith(new FakeStorage({ connectFailures: 1, failingInserts: [2] }), tracer).execute(
      { source_file: 'small.csv', target_table: 'raw.small', checkpoint_file: CHECKPOINT },
      { traceId },
    );

    expect(types.filter(t => t !== 'state_transition')).toEqual([
      'connection_retry',
      'batch_committed',
      'checkpoint_saved',
      'batch_failed',
    ]);
  });
});
