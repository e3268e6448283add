import { z } from 'zod';
import {
  CheckpointError,
  errorMessage,
  type CheckpointState,
  type CheckpointStore,
  type FileAccess,
} from '@crewline/shared';
import { LocalFileAccess } from './tools/file-access.js';

const checkpointDocumentSchema = z.object({
  last_row: z.number().int().min(0),
});

/**
 * Checkpoint kept as a JSON file `{ "last_row": n }`; the checkpoint id is
 * the file path.
 */
export class FileCheckpointStore implements CheckpointStore {
  constructor(private readonly files: FileAccess = new LocalFileAccess()) {}

  async load(id: string): Promise<CheckpointState | null> {
    if (!(await this.files.exists(id))) return null;

    let document: unknown;
    try {
      document = await this.files.readJson(id);
    } catch (err) {
      throw new CheckpointError(id, `unreadable checkpoint: ${errorMessage(err)}`);
    }

    const parsed = checkpointDocumentSchema.safeParse(document);
    if (!parsed.success) {
      throw new CheckpointError(id, 'invalid checkpoint document, expected { "last_row": <integer> }');
    }
    return { lastProcessedRow: parsed.data.last_row };
  }

  async save(id: string, state: CheckpointState): Promise<void> {
    await this.files.writeJson(id, { last_row: state.lastProcessedRow });
  }

  async clear(id: string): Promise<boolean> {
    return this.files.remove(id);
  }
}
