import type Database from 'better-sqlite3';
import type { ExecutionTrace, TraceEvent, TraceEventType, TraceSpan } from '@crewline/shared';
import { parseObjectColumn } from './json.js';

interface TraceRow {
  trace_id: string;
  subject: string;
  started_at: string;
  completed_at: string | null;
  duration_ms: number | null;
}

interface SpanRow {
  id: string;
  trace_id: string;
  parent_span_id: string | null;
  name: string;
  start_time: number;
  end_time: number | null;
}

interface EventRow {
  id: string;
  trace_id: string;
  span_id: string | null;
  type: string;
  timestamp: number;
  wall_clock: string;
  duration: number | null;
  data: string | null;
}

export interface TraceSummary {
  traceId: string;
  subject: string;
  startedAt: string;
  completedAt?: string;
  durationMs?: number;
}

const EVENT_TYPES: ReadonlySet<string> = new Set<TraceEventType>([
  'info', 'warn', 'error', 'state_transition', 'validation_failed', 'connection_retry',
  'batch_committed', 'batch_failed', 'checkpoint_saved', 'task_skipped', 'pipeline_abort',
  'decision_gate',
]);

function isTraceEventType(value: string): value is TraceEventType {
  return EVENT_TYPES.has(value);
}

export class TraceRepository {
  private insertTraceStmt: Database.Statement<[TraceRow]>;
  private insertSpanStmt: Database.Statement<[SpanRow]>;
  private insertEventStmt: Database.Statement<[EventRow]>;
  private getTraceStmt: Database.Statement<[string], TraceRow>;
  private getSpansStmt: Database.Statement<[string], SpanRow>;
  private getEventsStmt: Database.Statement<[string], EventRow>;
  private listStmt: Database.Statement<[number, number], TraceRow>;
  private deleteStmt: Database.Statement<[string]>;

  constructor(private db: Database.Database) {
    this.insertTraceStmt = db.prepare<[TraceRow]>(`
      INSERT OR REPLACE INTO traces (trace_id, subject, started_at, completed_at, duration_ms)
      VALUES (@trace_id, @subject, @started_at, @completed_at, @duration_ms)
    `);
    this.insertSpanStmt = db.prepare<[SpanRow]>(`
      INSERT OR REPLACE INTO trace_spans (id, trace_id, parent_span_id, name, start_time, end_time)
      VALUES (@id, @trace_id, @parent_span_id, @name, @start_time, @end_time)
    `);
    this.insertEventStmt = db.prepare<[EventRow]>(`
      INSERT OR REPLACE INTO trace_events (id, trace_id, span_id, type, timestamp, wall_clock, duration, data)
      VALUES (@id, @trace_id, @span_id, @type, @timestamp, @wall_clock, @duration, @data)
    `);
    this.getTraceStmt = db.prepare<[string], TraceRow>('SELECT * FROM traces WHERE trace_id = ?');
    this.getSpansStmt = db.prepare<[string], SpanRow>('SELECT * FROM trace_spans WHERE trace_id = ? ORDER BY start_time ASC');
    this.getEventsStmt = db.prepare<[string], EventRow>('SELECT * FROM trace_events WHERE trace_id = ? ORDER BY timestamp ASC');
    this.listStmt = db.prepare<[number, number], TraceRow>('SELECT * FROM traces ORDER BY started_at DESC LIMIT ? OFFSET ?');
    this.deleteStmt = db.prepare<[string]>('DELETE FROM traces WHERE trace_id = ?');
  }

  /** Save a complete trace with all spans and events in a single transaction. */
  save(trace: ExecutionTrace): void {
    const saveTx = this.db.transaction(() => {
      // Re-saving replaces the previous snapshot of the same trace
      this.deleteStmt.run(trace.traceId);
      this.insertTraceStmt.run({
        trace_id: trace.traceId,
        subject: trace.subject,
        started_at: trace.startedAt,
        completed_at: trace.completedAt ?? null,
        duration_ms: trace.totalDurationMs ?? null,
      });

      for (const { span, parentId } of flattenSpans(trace.spans)) {
        this.insertSpanStmt.run({
          id: span.id,
          trace_id: trace.traceId,
          parent_span_id: parentId ?? null,
          name: span.name,
          start_time: span.startTime,
          end_time: span.endTime ?? null,
        });

        for (const event of span.events) {
          this.insertEventStmt.run({
            id: event.id,
            trace_id: trace.traceId,
            span_id: span.id,
            type: event.type,
            timestamp: event.timestamp,
            wall_clock: event.wallClock,
            duration: event.duration ?? null,
            data: JSON.stringify(event.data),
          });
        }
      }
    });
    saveTx();
  }

  /** Load a complete trace, rebuilding the span tree from flat rows. */
  load(traceId: string): ExecutionTrace | null {
    const row = this.getTraceStmt.get(traceId);
    if (!row) return null;

    const eventsBySpan = new Map<string, TraceEvent[]>();
    for (const e of this.getEventsStmt.all(traceId)) {
      if (!e.span_id) continue;
      const events = eventsBySpan.get(e.span_id) ?? [];
      events.push({
        id: e.id,
        traceId: e.trace_id,
        parentSpanId: e.span_id,
        type: isTraceEventType(e.type) ? e.type : 'info',
        timestamp: e.timestamp,
        wallClock: e.wall_clock,
        duration: e.duration ?? undefined,
        data: parseObjectColumn(e.data),
      });
      eventsBySpan.set(e.span_id, events);
    }

    const spanRows = this.getSpansStmt.all(traceId);
    const spanMap = new Map<string, TraceSpan>();
    for (const s of spanRows) {
      spanMap.set(s.id, {
        id: s.id,
        traceId: s.trace_id,
        name: s.name,
        startTime: s.start_time,
        endTime: s.end_time ?? undefined,
        events: eventsBySpan.get(s.id) ?? [],
        children: [],
      });
    }

    const roots: TraceSpan[] = [];
    for (const s of spanRows) {
      const span = spanMap.get(s.id);
      if (!span) continue;
      const parent = s.parent_span_id ? spanMap.get(s.parent_span_id) : undefined;
      if (parent) {
        parent.children.push(span);
      } else {
        roots.push(span);
      }
    }

    return { ...toSummary(row), spans: roots };
  }

  list(options?: { limit?: number; offset?: number }): TraceSummary[] {
    return this.listStmt
      .all(options?.limit ?? 100, options?.offset ?? 0)
      .map(toSummary);
  }

  delete(traceId: string): boolean {
    return this.deleteStmt.run(traceId).changes > 0;
  }
}

function toSummary(row: TraceRow): TraceSummary {
  return {
    traceId: row.trace_id,
    subject: row.subject,
    startedAt: row.started_at,
    completedAt: row.completed_at ?? undefined,
    durationMs: row.duration_ms ?? undefined,
  };
}

function flattenSpans(
  spans: TraceSpan[],
  parentId?: string,
): Array<{ span: TraceSpan; parentId?: string }> {
  const result: Array<{ span: TraceSpan; parentId?: string }> = [];
  for (const span of spans) {
    result.push({ span, parentId });
    result.push(...flattenSpans(span.children, span.id));
  }
  return result;
}
