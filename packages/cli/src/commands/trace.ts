import { Command } from 'commander';
import { formatTrace, formatTraceList } from '../output/formatter.js';
import { parsePositiveInt, withRuntime } from '../runtime.js';

export const traceCommand = new Command('trace')
  .description('View a persisted execution trace, or list recent ones')
  .argument('[trace-id]', 'Trace ID to view')
  .option('-n, --limit <n>', 'Traces to list when no ID is given', parsePositiveInt, 20)
  .option('--json', 'Output as JSON')
  .action(async (traceId: string | undefined, options: { limit: number; json?: boolean }, command: Command) => {
    await withRuntime(command, async runtime => {
      if (!traceId) {
        const traces = runtime.store.traces.list({ limit: options.limit });
        console.log(options.json ? JSON.stringify(traces, null, 2) : formatTraceList(traces));
        return true;
      }

      const trace = runtime.tracer.loadTrace(traceId);
      if (!trace) {
        console.error(`Trace not found: ${traceId}`);
        return false;
      }
      console.log(options.json ? JSON.stringify(trace, null, 2) : formatTrace(trace));
      return true;
    });
  });
