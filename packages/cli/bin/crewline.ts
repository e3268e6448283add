#!/usr/bin/env node
import { Command } from 'commander';
import { ingestCommand } from '../src/commands/ingest.js';
import { pipelineCommand } from '../src/commands/pipeline.js';
import { workflowCommand } from '../src/commands/workflow.js';
import { checkpointCommand } from '../src/commands/checkpoint.js';
import { historyCommand } from '../src/commands/history.js';
import { traceCommand } from '../src/commands/trace.js';
import { configCommand } from '../src/commands/config.js';

const program = new Command();

program
  .name('crewline')
  .description('Checkpointed CSV ingestion and gated pipeline orchestration')
  .version('0.1.0')
  .option('-c, --config <path>', 'Config file (default: searched upward from the working directory)')
  .option('-v, --verbose', 'Print every trace event, state transitions included');

program.addCommand(ingestCommand);
program.addCommand(pipelineCommand);
program.addCommand(workflowCommand);
program.addCommand(checkpointCommand);
program.addCommand(historyCommand);
program.addCommand(traceCommand);
program.addCommand(configCommand);

await program.parseAsync();
