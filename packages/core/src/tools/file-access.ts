import { createReadStream } from 'node:fs';
import { pipeline } from 'node:stream';
import { mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { parse } from 'csv-parse';
import { isRecord, type CsvBatchOptions, type CsvRecord, type FileAccess } from '@crewline/shared';

/** Local filesystem access; CSV is read through the streaming csv-parse parser. */
export class LocalFileAccess implements FileAccess {
  async exists(path: string): Promise<boolean> {
    return stat(path).then(() => true, () => false);
  }

  async isFile(path: string): Promise<boolean> {
    return stat(path).then(s => s.isFile(), () => false);
  }

  async readJson(path: string): Promise<unknown> {
    const content = await readFile(path, 'utf-8');
    return JSON.parse(content);
  }

  async writeJson(path: string, data: unknown): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(data), 'utf-8');
  }

  async remove(path: string): Promise<boolean> {
    if (!(await this.exists(path))) return false;
    await rm(path);
    return true;
  }

  async countCsvRows(path: string): Promise<number> {
    let count = 0;
    for await (const _record of openCsv(path)) {
      count++;
    }
    return count;
  }

  async *readCsvBatches(path: string, options: CsvBatchOptions): AsyncIterable<CsvRecord[]> {
    const skip = options.skipRows ?? 0;
    let seen = 0;
    let batch: CsvRecord[] = [];

    for await (const record of openCsv(path)) {
      if (seen++ < skip) continue;
      batch.push(toCsvRecord(record));
      if (batch.length >= options.batchSize) {
        yield batch;
        batch = [];
      }
    }
    if (batch.length > 0) {
      yield batch;
    }
  }
}

/**
 * Read errors reject the iteration, and leaving the loop early closes the
 * file.
 */
function openCsv(path: string): AsyncIterable<unknown> {
  const parser = parse({ columns: true, skip_empty_lines: true, bom: true });
  pipeline(createReadStream(path), parser, err => {
    if (err && !parser.destroyed) parser.destroy(err);
  });
  return parser;
}

function toCsvRecord(value: unknown): CsvRecord {
  const record: CsvRecord = {};
  if (!isRecord(value)) return record;
  for (const [key, field] of Object.entries(value)) {
    record[key] = field === undefined || field === null ? '' : String(field);
  }
  return record;
}
