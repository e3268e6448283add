import { Command } from 'commander';
import { formatCheckpoint } from '../output/formatter.js';
import { withRuntime } from '../runtime.js';

export const checkpointCommand = new Command('checkpoint')
  .description('Inspect or reset ingestion checkpoints');

checkpointCommand
  .command('show')
  .description('Show how many rows a checkpoint has processed')
  .argument('<id>', 'Checkpoint id (file path, or key in the state database)')
  .action(async (id: string, _options: unknown, command: Command) => {
    await withRuntime(command, async runtime => {
      console.log(formatCheckpoint(id, await runtime.checkpoints.load(id)));
      return true;
    });
  });

checkpointCommand
  .command('clear')
  .description('Delete a checkpoint so the next ingestion starts from the first row')
  .argument('<id>', 'Checkpoint id')
  .action(async (id: string, _options: unknown, command: Command) => {
    await withRuntime(command, async runtime => {
      const removed = await runtime.checkpoints.clear(id);
      console.log(removed ? `Cleared checkpoint ${id}` : `No checkpoint ${id}`);
      return true;
    });
  });

checkpointCommand
  .command('list')
  .description('List checkpoints kept in the state database')
  .action(async (_options: unknown, command: Command) => {
    await withRuntime(command, async runtime => {
      const entries = runtime.store.checkpoints.list();
      if (entries.length === 0) {
        console.log('No checkpoints in the state database.');
      }
      for (const entry of entries) {
        console.log(`${formatCheckpoint(entry.id, entry)}  (updated ${entry.updatedAt})`);
      }
      return true;
    });
  });
