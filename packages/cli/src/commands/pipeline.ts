import { Command, Option } from 'commander';
import { toWireReport, type DataPipelineCrew } from '@crewline/core';
import type { CrewContext, CrewReport } from '@crewline/shared';
import { readCrewContext } from '../context-file.js';
import { formatCrewReport } from '../output/formatter.js';
import { withRuntime } from '../runtime.js';

type PipelineTask = 'ingestion' | 'transformation' | 'quality';

interface PipelineOptions {
  context: string;
  only?: PipelineTask;
  json?: boolean;
}

function run(crew: DataPipelineCrew, context: CrewContext, only: PipelineTask | undefined): Promise<CrewReport> {
  switch (only) {
    case 'ingestion':
      return crew.runIngestionOnly(context.ingestion ?? {});
    case 'transformation':
      return crew.runTransformationOnly(context.transformation ?? {});
    case 'quality':
      return crew.runQualityCheckOnly(context.quality ?? {});
    case undefined:
      return crew.kickoff(context);
  }
}

export const pipelineCommand = new Command('pipeline')
  .description('Run the data pipeline crew: ingestion, transformation, quality')
  .requiredOption('--context <json>', 'JSON file mapping task names to task inputs')
  .addOption(
    new Option('--only <task>', 'Run a single task of the crew').choices(['ingestion', 'transformation', 'quality']),
  )
  .option('--json', 'Output as JSON')
  .action(async (options: PipelineOptions, command: Command) => {
    await withRuntime(command, async runtime => {
      const context = await readCrewContext(options.context);
      const report = await run(runtime.dataPipeline, context, options.only);
      console.log(options.json ? JSON.stringify(toWireReport(report), null, 2) : formatCrewReport(report));
      return report.status === 'success';
    });
  });
