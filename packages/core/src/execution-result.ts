import type { AgentStatus, ExecutionRecord } from '@crewline/shared';
import { isoNow } from '@crewline/shared';

interface ResultInit<T> {
  status: AgentStatus;
  output: T | null;
  errors: string[];
  metrics?: Record<string, number>;
  metadata?: Record<string, unknown>;
}

/**
 * Outcome of a single agent execution. Frozen on creation, together with
 * its error list and maps.
 */
export class ExecutionResult<T = unknown> {
  readonly status: AgentStatus;
  readonly output: T | null;
  readonly errors: readonly string[];
  readonly metrics: Readonly<Record<string, number>>;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly timestamp: string;

  private constructor(init: ResultInit<T>) {
    this.status = init.status;
    this.output = init.output;
    this.errors = Object.freeze([...init.errors]);
    this.metrics = Object.freeze({ ...init.metrics });
    this.metadata = Object.freeze({ ...init.metadata });
    this.timestamp = isoNow();
    Object.freeze(this);
  }

  static success<T>(
    output: T,
    options: { metrics?: Record<string, number>; metadata?: Record<string, unknown> } = {},
  ): ExecutionResult<T> {
    return new ExecutionResult<T>({ status: 'success', output, errors: [], ...options });
  }

  /** A failure always carries at least one error. */
  static failure<T = never>(
    errors: string[],
    options: { metadata?: Record<string, unknown> } = {},
  ): ExecutionResult<T> {
    return new ExecutionResult<T>({
      status: 'failed',
      output: null,
      errors: errors.length > 0 ? errors : ['Unknown error'],
      metadata: options.metadata,
    });
  }

  isSuccess(): boolean {
    return this.status === 'success';
  }

  toRecord(): ExecutionRecord {
    return {
      status: this.status,
      output: this.output,
      metrics: { ...this.metrics },
      errors: [...this.errors],
      metadata: { ...this.metadata },
      timestamp: this.timestamp,
    };
  }
}
