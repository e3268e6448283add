import { Command } from 'commander';
import { readWorkflowContext } from '../context-file.js';
import { formatWorkflowReport } from '../output/formatter.js';
import { withRuntime } from '../runtime.js';

export const workflowCommand = new Command('workflow')
  .description('Run data pipeline, model development and deployment with decision gates')
  .requiredOption('--context <json>', 'JSON file mapping stage names to crew contexts')
  .option('--json', 'Output as JSON')
  .action(async (options: { context: string; json?: boolean }, command: Command) => {
    await withRuntime(command, async runtime => {
      const context = await readWorkflowContext(options.context);
      const report = await runtime.orchestrator.execute(context, {
        onStage: stage => {
          if (!options.json) console.error(`-> ${stage.stage}: ${stage.status}`);
        },
      });

      console.log(options.json ? JSON.stringify(report, null, 2) : formatWorkflowReport(report));
      return report.workflowStatus === 'success';
    });
  });
