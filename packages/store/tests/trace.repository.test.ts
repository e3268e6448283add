import { describe, it, expect, beforeEach } from 'vitest';
import type Database from 'better-sqlite3';
import type { ExecutionTrace } from '@crewline/shared';
import { TraceRepository } from '../src/repositories/trace.repository.js';
import { freshDb } from './helpers.js';

let db: Database.Database;
let repo: TraceRepository;

beforeEach(() => {
  db = freshDb();
  repo = new TraceRepository(db);
});

function sampleTrace(overrides: Partial<ExecutionTrace> = {}): ExecutionTrace {
  return {
    traceId: 'trace-001',
    subject: 'crew:data-pipeline',
    startedAt: '2024-01-01T00:00:00Z',
    completedAt: '2024-01-01T00:01:00Z',
    totalDurationMs: 60000,
    spans: [
      {
        id: 'span-001',
        traceId: 'trace-001',
        name: 'task:ingestion',
        startTime: 100,
        endTime: 400,
        events: [
          {
            id: 'evt-001',
            traceId: 'trace-001',
            parentSpanId: 'span-001',
            type: 'batch_committed',
            timestamp: 150,
            wallClock: '2024-01-01T00:00:00Z',
            data: { rows: 30 },
          },
        ],
        children: [
          {
            id: 'span-002',
            traceId: 'trace-001',
            name: 'connect',
            startTime: 110,
            endTime: 120,
            events: [],
            children: [],
          },
        ],
      },
    ],
    ...overrides,
  };
}

describe('TraceRepository', () => {
  it('saves and loads a trace with spans and events', () => {
    repo.save(sampleTrace());

    const loaded = repo.load('trace-001');
    expect(loaded?.subject).toBe('crew:data-pipeline');
    expect(loaded?.totalDurationMs).toBe(60000);
    expect(loaded?.completedAt).toBe('2024-01-01T00:01:00Z');
  });

  it('reconstructs the span tree from flat rows', () => {
    repo.save(sampleTrace());
    const spans = repo.load('trace-001')?.spans ?? [];

    expect(spans).toHaveLength(1);
    expect(spans[0].name).toBe('task:ingestion');
    expect(spans[0].events.map(e => [e.type, e.data])).toEqual([['batch_committed', { rows: 30 }]]);
    expect(spans[0].children.map(c => c.name)).toEqual(['connect']);
  });

  it('re-saving a trace replaces its spans', () => {
    repo.save(sampleTrace());
    repo.save(sampleTrace({ spans: [] }));

    expect(repo.load('trace-001')?.spans).toEqual([]);
    expect(db.prepare('SELECT * FROM trace_events').all()).toHaveLength(0);
  });

  it('returns null for non-existent trace', () => {
    expect(repo.load('nonexistent')).toBeNull();
  });

  it('lists traces ordered by started_at DESC', () => {
    repo.save(sampleTrace({ traceId: 'trace-001', startedAt: '2024-01-01T00:00:00Z', spans: [] }));
    repo.save(sampleTrace({ traceId: 'trace-002', startedAt: '2024-01-02T00:00:00Z', spans: [] }));

    expect(repo.list().map(t => t.traceId)).toEqual(['trace-002', 'trace-001']);
    expect(repo.list({ limit: 1 })).toHaveLength(1);
  });

  it('deletes a trace and cascades', () => {
    repo.save(sampleTrace());
    expect(repo.delete('trace-001')).toBe(true);
    expect(repo.load('trace-001')).toBeNull();

    expect(db.prepare('SELECT * FROM trace_spans WHERE trace_id = ?').all('trace-001')).toHaveLength(0);
    expect(db.prepare('SELECT * FROM trace_events WHERE trace_id = ?').all('trace-001')).toHaveLength(0);
  });
});
