import { Command } from 'commander';
import { formatExecutions } from '../output/formatter.js';
import { parsePositiveInt, withRuntime } from '../runtime.js';

interface HistoryOptions {
  agent?: string;
  run?: string;
  limit: number;
  json?: boolean;
}

export const historyCommand = new Command('history')
  .description('Show recorded agent executions, newest first')
  .option('-a, --agent <name>', 'Only executions of this agent')
  .option('-r, --run <id>', 'Only executions of this run')
  .option('-n, --limit <n>', 'Maximum entries', parsePositiveInt, 20)
  .option('--json', 'Output as JSON')
  .action(async (options: HistoryOptions, command: Command) => {
    await withRuntime(command, async runtime => {
      const entries = runtime.store.executions.list({
        agentName: options.agent,
        runId: options.run,
        limit: options.limit,
      });
      console.log(options.json ? JSON.stringify(entries, null, 2) : formatExecutions(entries));
      return true;
    });
  });
