import type { z } from 'zod';
import {
  errorMessage,
  formatIssues,
  generateId,
  monotonicNow,
  type AgentRunOptions,
  type AgentStatus,
  type CoreOutcome,
  type ExecutionSink,
  type TraceEventType,
  type ValidationOutcome,
} from '@crewline/shared';
import { ExecutionResult } from './execution-result.js';
import { ExecutionHistory } from './execution-history.js';
import { validationFailure, validationSuccess } from './outcome.js';
import type { TraceLogger } from './trace-logger.js';

export interface AgentOptions {
  tracer?: TraceLogger;
  /** Receives every result, e.g. the store's ExecutionRepository */
  sink?: ExecutionSink;
  historyLimit?: number;
}

/** What crews need from an agent. */
export interface ExecutableAgent {
  readonly name: string;
  execute(context: Record<string, unknown>, options?: AgentRunOptions): Promise<ExecutionResult<unknown>>;
}

/**
 * Base class for every unit of work. `execute` validates the context,
 * runs the core logic, and records exactly one result per call; no fault
 * escapes it.
 */
export abstract class Agent<TInput, TOutput> implements ExecutableAgent {
  status: AgentStatus = 'idle';

  protected abstract readonly inputSchema: z.ZodType<TInput, z.ZodTypeDef, unknown>;

  private readonly history: ExecutionHistory<ExecutionResult<TOutput>>;
  protected readonly tracer?: TraceLogger;
  private readonly sink?: ExecutionSink;

  constructor(
    readonly name: string,
    readonly description: string,
    options: AgentOptions = {},
  ) {
    this.history = new ExecutionHistory(options.historyLimit);
    this.tracer = options.tracer;
    this.sink = options.sink;
  }

  /** Retained results, oldest first. */
  get executionHistory(): ExecutionResult<TOutput>[] {
    return this.history.entries();
  }

  get totalRecorded(): number {
    return this.history.totalRecorded;
  }

  async validateInputs(context: Record<string, unknown>): Promise<ValidationOutcome<TInput>> {
    const parsed = this.inputSchema.safeParse(context);
    if (!parsed.success) {
      return validationFailure(formatIssues(parsed.error.issues));
    }

    const problems = await this.checkPreconditions(parsed.data);
    return problems.length > 0 ? validationFailure(problems) : validationSuccess(parsed.data);
  }

  async execute(
    context: Record<string, unknown>,
    options: AgentRunOptions = {},
  ): Promise<ExecutionResult<TOutput>> {
    const { traceId } = options;
    const spanId = this.traceActive(traceId) ? this.tracer?.startSpan(traceId, `agent:${this.name}`) : undefined;
    const startTime = monotonicNow();
    this.transition('running', traceId);

    let result: ExecutionResult<TOutput>;
    const metadata = (): Record<string, unknown> => ({
      agentName: this.name,
      context,
      durationMs: monotonicNow() - startTime,
    });

    try {
      const validation = await this.validateInputs(context);
      if (!validation.valid) {
        this.trace(traceId, 'validation_failed', { agent: this.name, errors: validation.errors });
        result = ExecutionResult.failure(validation.errors, { metadata: metadata() });
      } else {
        const outcome = await this.runCore(validation.value, options);
        result = outcome.ok
          ? ExecutionResult.success(outcome.output, { metrics: outcome.metrics, metadata: metadata() })
          : ExecutionResult.failure(outcome.errors, { metadata: metadata() });
      }
    } catch (err) {
      this.trace(traceId, 'error', { agent: this.name, message: errorMessage(err) });
      result = ExecutionResult.failure([errorMessage(err)], { metadata: metadata() });
    }

    this.transition(result.status, traceId);
    await this.record(result, options);

    if (spanId && traceId && this.tracer?.hasTrace(traceId)) {
      this.tracer.endSpan(traceId, spanId);
    }
    return result;
  }

  /** Force `idle` and drop the retained history. */
  reset(): void {
    this.status = 'idle';
    this.history.clear();
  }

  /** Checks beyond the schema, e.g. that a file exists. Returns error strings. */
  protected async checkPreconditions(_input: TInput): Promise<string[]> {
    return [];
  }

  protected abstract runCore(input: TInput, options: AgentRunOptions): Promise<CoreOutcome<TOutput>>;

  /** Log a trace event when this run is traced. */
  protected trace(traceId: string | undefined, type: TraceEventType, data: Record<string, unknown>): void {
    if (this.traceActive(traceId)) {
      this.tracer?.logEvent(traceId, type, data);
    }
  }

  private traceActive(traceId: string | undefined): traceId is string {
    return traceId !== undefined && this.tracer !== undefined && this.tracer.hasTrace(traceId);
  }

  private transition(to: AgentStatus, traceId: string | undefined): void {
    const from = this.status;
    this.status = to;
    if (this.traceActive(traceId)) {
      this.tracer?.logStateTransition(traceId, this.name, from, to);
    }
  }

  private async record(result: ExecutionResult<TOutput>, options: AgentRunOptions): Promise<void> {
    this.history.push(result);
    if (!this.sink) return;

    try {
      await this.sink.append({
        runId: options.runId ?? generateId('run'),
        agentName: this.name,
        record: result.toRecord(),
      });
    } catch (err) {
      this.trace(options.traceId, 'warn', { agent: this.name, message: `Execution not persisted: ${errorMessage(err)}` });
    }
  }
}
