import {
  generateId,
  monotonicNow,
  isoNow,
  errorMessage,
  type TraceEvent,
  type TraceSpan,
  type ExecutionTrace,
  type TraceEventType,
} from '@crewline/shared';
import type { TraceRepository } from '@crewline/store';

export type TraceListener = (event: TraceEvent, subject: string) => void;

export interface TraceLoggerOptions {
  /** Completed traces are saved here when given */
  repository?: TraceRepository;
  /** Called for every event as it is logged */
  listener?: TraceListener;
}

/**
 * Per-run traces of nested spans and typed events. Each trace opens a root
 * span named after its subject, so every event has a span to live in.
 */
export class TraceLogger {
  private traces = new Map<string, TraceState>();
  private repo?: TraceRepository;
  private listener?: TraceListener;

  constructor(options: TraceLoggerOptions = {}) {
    this.repo = options.repository;
    this.listener = options.listener;
  }

  createTrace(subject: string, traceId: string = generateId('trace')): string {
    const root: TraceSpan = {
      id: generateId('span'),
      traceId,
      name: subject,
      startTime: monotonicNow(),
      events: [],
      children: [],
    };
    this.traces.set(traceId, {
      traceId,
      subject,
      startedAt: isoNow(),
      startTime: root.startTime,
      root,
      spanStack: [root.id],
    });
    return traceId;
  }

  startSpan(traceId: string, name: string, data?: Record<string, unknown>): string {
    const state = this.getState(traceId);
    const span: TraceSpan = {
      id: generateId('span'),
      traceId,
      name,
      startTime: monotonicNow(),
      events: [],
      children: [],
    };

    const parent = this.findSpan([state.root], currentSpanId(state));
    (parent ?? state.root).children.push(span);
    state.spanStack.push(span.id);

    if (data) {
      this.logEvent(traceId, 'info', data, span.id);
    }
    return span.id;
  }

  endSpan(traceId: string, spanId: string): void {
    const state = this.getState(traceId);
    const span = this.findSpan([state.root], spanId);
    if (span) {
      span.endTime = monotonicNow();
    }
    const idx = state.spanStack.indexOf(spanId);
    if (idx > 0) {
      state.spanStack.splice(idx, 1);
    }
  }

  logEvent(
    traceId: string,
    type: TraceEventType,
    data: Record<string, unknown>,
    parentSpanId?: string,
  ): void {
    const state = this.getState(traceId);
    const spanId = parentSpanId ?? currentSpanId(state);
    const event: TraceEvent = {
      id: generateId('evt'),
      traceId,
      parentSpanId: spanId,
      type,
      timestamp: monotonicNow(),
      wallClock: isoNow(),
      data,
    };

    const span = this.findSpan([state.root], spanId) ?? state.root;
    span.events.push(event);
    this.listener?.(event, state.subject);
  }

  logStateTransition(traceId: string, agent: string, from: string, to: string): void {
    this.logEvent(traceId, 'state_transition', { agent, from, to });
  }

  /** Close the trace, persist it when a repository is attached, and drop it from memory. */
  completeTrace(traceId: string): ExecutionTrace {
    const state = this.getState(traceId);
    const now = monotonicNow();
    state.root.endTime = now;

    const trace: ExecutionTrace = {
      traceId: state.traceId,
      subject: state.subject,
      startedAt: state.startedAt,
      completedAt: isoNow(),
      totalDurationMs: now - state.startTime,
      spans: [state.root],
    };

    if (this.repo) {
      try {
        this.repo.save(trace);
      } catch (err) {
        // Tracing never fails the run it observes
        this.listener?.(
          {
            id: generateId('evt'),
            traceId,
            type: 'warn',
            timestamp: now,
            wallClock: isoNow(),
            data: { message: `Trace not persisted: ${errorMessage(err)}` },
          },
          state.subject,
        );
      }
    }

    this.traces.delete(traceId);
    return trace;
  }

  /** Load a previously persisted trace. */
  loadTrace(traceId: string): ExecutionTrace | null {
    return this.repo?.load(traceId) ?? null;
  }

  hasTrace(traceId: string): boolean {
    return this.traces.has(traceId);
  }

  private getState(traceId: string): TraceState {
    const state = this.traces.get(traceId);
    if (!state) throw new Error(`Trace not found: ${traceId}`);
    return state;
  }

  private findSpan(spans: TraceSpan[], id: string): TraceSpan | undefined {
    for (const span of spans) {
      if (span.id === id) return span;
      const found = this.findSpan(span.children, id);
      if (found) return found;
    }
    return undefined;
  }
}

interface TraceState {
  traceId: string;
  subject: string;
  startedAt: string;
  startTime: number;
  root: TraceSpan;
  /** Open spans, root first */
  spanStack: string[];
}

function currentSpanId(state: TraceState): string {
  return state.spanStack[state.spanStack.length - 1] ?? state.root.id;
}
