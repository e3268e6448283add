import type { LogLevel, TraceEvent, TraceEventType } from '@crewline/shared';
import type { TraceListener } from '@crewline/core';
import { formatFields } from './formatter.js';

const EVENT_LEVELS: Record<TraceEventType, LogLevel> = {
  state_transition: 'debug',
  info: 'info',
  batch_committed: 'info',
  checkpoint_saved: 'info',
  task_skipped: 'info',
  decision_gate: 'info',
  warn: 'warn',
  connection_retry: 'warn',
  batch_failed: 'warn',
  validation_failed: 'warn',
  pipeline_abort: 'warn',
  error: 'error',
};

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function eventLevel(type: TraceEventType): LogLevel {
  return EVENT_LEVELS[type];
}

export function formatEvent(event: TraceEvent, subject: string): string {
  const { message, ...rest } = event.data;
  const text = typeof message === 'string' ? ` ${message}` : '';
  const fields = formatFields(rest);
  return `[${eventLevel(event.type)}] ${subject} ${event.type}${text}${fields ? ` ${fields}` : ''}`;
}

/** Listener printing trace events at or above `minLevel` to stderr. */
export function createEventPrinter(
  minLevel: LogLevel,
  write: (line: string) => void = line => console.error(line),
): TraceListener {
  return (event, subject) => {
    if (LEVEL_RANK[eventLevel(event.type)] >= LEVEL_RANK[minLevel]) {
      write(formatEvent(event, subject));
    }
  };
}
