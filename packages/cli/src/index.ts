export {
  formatCheckpoint,
  formatCrewReport,
  formatDuration,
  formatExecutions,
  formatFields,
  formatNumber,
  formatTrace,
  formatTraceList,
  formatWorkflowReport,
} from './output/formatter.js';
export { createEventPrinter, eventLevel, formatEvent } from './output/event-printer.js';
export { readCrewContext, readWorkflowContext } from './context-file.js';
export { withRuntime, parsePositiveInt } from './runtime.js';
export type { GlobalOptions } from './runtime.js';
