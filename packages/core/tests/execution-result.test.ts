import { describe, it, expect } from 'vitest';
import { ExecutionResult } from '../src/execution-result.js';
import { ExecutionHistory } from '../src/execution-history.js';

describe('ExecutionResult', () => {
  it('builds a frozen success with metrics and metadata', () => {
    const result = ExecutionResult.success({ rows: 3 }, { metrics: { rows: 3 }, metadata: { agentName: 'a' } });

    expect(result.isSuccess()).toBe(true);
    expect(result.errors).toEqual([]);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.errors)).toBe(true);
    expect(Object.isFrozen(result.metrics)).toBe(true);
    expect(Object.isFrozen(result.metadata)).toBe(true);
  });

  it('replaces an empty error list with "Unknown error"', () => {
    const result = ExecutionResult.failure([]);

    expect(result.status).toBe('failed');
    expect(result.output).toBeNull();
    expect(result.errors).toEqual(['Unknown error']);
  });

  it('converts to the plain record form', () => {
    const result = ExecutionResult.failure(['boom'], { metadata: { agentName: 'x' } });

    expect(result.toRecord()).toEqual({
      status: 'failed',
      output: null,
      metrics: {},
      errors: ['boom'],
      metadata: { agentName: 'x' },
      timestamp: result.timestamp,
    });
  });
});

describe('ExecutionHistory', () => {
  it('keeps the newest entries once full', () => {
    const history = new ExecutionHistory<number>(3);
    for (let i = 1; i <= 5; i++) history.push(i);

    expect(history.entries()).toEqual([3, 4, 5]);
    expect(history.latest()).toBe(5);
    expect(history.size).toBe(3);
    expect(history.totalRecorded).toBe(5);
  });

  it('returns entries oldest first before wrapping', () => {
    const history = new ExecutionHistory<string>(4);
    history.push('a');
    history.push('b');

    expect(history.entries()).toEqual(['a', 'b']);
    expect(history.latest()).toBe('b');
  });

  it('clears entries and the running count', () => {
    const history = new ExecutionHistory<number>(2);
    history.push(1);
    history.clear();

    expect(history.entries()).toEqual([]);
    expect(history.latest()).toBeUndefined();
    expect(history.totalRecorded).toBe(0);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new ExecutionHistory(0)).toThrow(RangeError);
  });
});
