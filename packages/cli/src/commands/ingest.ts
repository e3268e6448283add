import { Command } from 'commander';
import { toWireReport } from '@crewline/core';
import { formatCrewReport } from '../output/formatter.js';
import { parsePositiveInt, withRuntime } from '../runtime.js';

interface IngestOptions {
  source: string;
  target: string;
  batchSize?: number;
  checkpoint?: string;
  json?: boolean;
}

export const ingestCommand = new Command('ingest')
  .description('Load a CSV file into a warehouse table in checkpointed batches')
  .requiredOption('-s, --source <csv>', 'CSV file to load')
  .requiredOption('-t, --target <schema.table>', 'Destination table')
  .option('-b, --batch-size <n>', 'Rows per batch (overrides config)', parsePositiveInt)
  .option('--checkpoint <id>', 'Checkpoint to resume from and update')
  .option('--json', 'Output as JSON')
  .action(async (options: IngestOptions, command: Command) => {
    await withRuntime(command, async runtime => {
      const input: Record<string, unknown> = {
        source_file: options.source,
        target_table: options.target,
      };
      if (options.batchSize !== undefined) input.batch_size = options.batchSize;
      if (options.checkpoint) input.checkpoint_file = options.checkpoint;

      const report = await runtime.dataPipeline.runIngestionOnly(input);
      console.log(options.json ? JSON.stringify(toWireReport(report), null, 2) : formatCrewReport(report));
      return report.status === 'success';
    });
  });
