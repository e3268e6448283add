import { describe, it, expect, beforeEach } from 'vitest';
import type { ExecutionRecord } from '@crewline/shared';
import { ExecutionRepository } from '../src/repositories/execution.repository.js';
import { freshDb } from './helpers.js';

let repo: ExecutionRepository;

beforeEach(() => {
  repo = new ExecutionRepository(freshDb());
});

function record(overrides: Partial<ExecutionRecord> = {}): ExecutionRecord {
  return {
    status: 'success',
    output: { rows_ingested: 10 },
    metrics: { duration_seconds: 1.5 },
    errors: [],
    metadata: { context: { source_file: 'a.csv' } },
    timestamp: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('ExecutionRepository', () => {
  it('appends and reads back a full record', () => {
    repo.append({ runId: 'run-1', agentName: 'ingestion', record: record() });

    const [entry] = repo.list();
    expect(entry.runId).toBe('run-1');
    expect(entry.agentName).toBe('ingestion');
    expect(entry.record).toEqual(record());
    expect(typeof entry.id).toBe('number');
  });

  it('lists newest first and filters by agent and run', () => {
    repo.append({ runId: 'run-1', agentName: 'ingestion', record: record() });
    repo.append({ runId: 'run-1', agentName: 'quality', record: record({ status: 'failed', errors: ['boom'] }) });
    repo.append({ runId: 'run-2', agentName: 'ingestion', record: record({ output: null }) });

    expect(repo.list().map(e => e.agentName)).toEqual(['ingestion', 'quality', 'ingestion']);
    expect(repo.list({ agentName: 'ingestion' }).map(e => e.runId)).toEqual(['run-2', 'run-1']);
    expect(repo.list({ runId: 'run-1' })).toHaveLength(2);
    expect(repo.list({ agentName: 'quality' })[0].record.errors).toEqual(['boom']);
    expect(repo.list({ limit: 1 })).toHaveLength(1);
  });

  it('counts all executions or those of one agent', () => {
    repo.append({ runId: 'r', agentName: 'ingestion', record: record() });
    repo.append({ runId: 'r', agentName: 'quality', record: record() });

    expect(repo.count()).toBe(2);
    expect(repo.count('quality')).toBe(1);
    expect(repo.count('missing')).toBe(0);
  });
});
