export type TraceEventType =
  | 'info'
  | 'warn'
  | 'error'
  | 'state_transition'
  | 'validation_failed'
  | 'connection_retry'
  | 'batch_committed'
  | 'batch_failed'
  | 'checkpoint_saved'
  | 'task_skipped'
  | 'pipeline_abort'
  | 'decision_gate';

export interface TraceEvent {
  id: string;
  traceId: string;
  parentSpanId?: string;
  type: TraceEventType;
  timestamp: number;
  wallClock: string;
  duration?: number;
  data: Record<string, unknown>;
}

export interface TraceSpan {
  id: string;
  traceId: string;
  name: string;
  startTime: number;
  endTime?: number;
  events: TraceEvent[];
  children: TraceSpan[];
}

export interface ExecutionTrace {
  traceId: string;
  /** What the trace covers, e.g. `workflow` or `crew:data-pipeline` */
  subject: string;
  startedAt: string;
  completedAt?: string;
  totalDurationMs?: number;
  spans: TraceSpan[];
}
