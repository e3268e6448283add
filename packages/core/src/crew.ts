import {
  DATA_PIPELINE_TASKS,
  DEPLOYMENT_TASKS,
  MODEL_DEVELOPMENT_TASKS,
  QUALITY_THRESHOLD,
  isRecord,
  isoNow,
  monotonicNow,
  numberField,
  type CrewContext,
  type CrewEvent,
  type CrewReport,
  type CrewStatus,
  type ExecutionRecord,
  type WireCrewReport,
} from '@crewline/shared';
import type { ExecutableAgent } from './agent.js';
import type { ExecutionResult } from './execution-result.js';
import type { TraceLogger } from './trace-logger.js';

/** Returns an error message when a successful result is still unacceptable. */
export type PostCondition = (result: ExecutionResult<unknown>) => string | undefined;

export interface CrewTask {
  name: string;
  agent: ExecutableAgent;
  postCondition?: PostCondition;
}

export type CrewSummarizer = (results: Record<string, ExecutionRecord>) => Record<string, unknown>;

export interface CrewDefinition {
  name: string;
  tasks: CrewTask[];
  summarize?: CrewSummarizer;
  tracer?: TraceLogger;
}

export interface KickoffOptions {
  /** Output of the previous crew; task context keys win over it */
  upstream?: Record<string, unknown>;
  traceId?: string;
  runId?: string;
  onEvent?: (event: CrewEvent) => void;
}

/**
 * Ordered, fail-fast pipeline of agents. Tasks run one at a time in
 * declaration order; a task absent from the context is skipped.
 */
export class Crew {
  readonly name: string;
  readonly tasks: readonly CrewTask[];
  private readonly summarize: CrewSummarizer;
  private readonly tracer?: TraceLogger;

  constructor(definition: CrewDefinition) {
    const seen = new Set<string>();
    for (const task of definition.tasks) {
      if (seen.has(task.name)) {
        throw new Error(`Duplicate task "${task.name}" in crew ${definition.name}`);
      }
      seen.add(task.name);
    }
    this.name = definition.name;
    this.tasks = [...definition.tasks];
    this.summarize = definition.summarize ?? mergeOutputs;
    this.tracer = definition.tracer;
  }

  get taskNames(): string[] {
    return this.tasks.map(t => t.name);
  }

  async kickoff(context: CrewContext, options: KickoffOptions = {}): Promise<CrewReport> {
    const startTime = monotonicNow();
    const upstream = options.upstream ?? {};
    const emit = options.onEvent ?? (() => {});

    // Own trace unless the caller passed one in
    const ownsTrace = !options.traceId && this.tracer !== undefined;
    const traceId = options.traceId ?? this.tracer?.createTrace(`crew:${this.name}`);
    const spanId = traceId && !ownsTrace ? this.tracer?.startSpan(traceId, `crew:${this.name}`) : undefined;
    const log = (type: 'task_skipped' | 'pipeline_abort', data: Record<string, unknown>): void => {
      if (traceId && this.tracer?.hasTrace(traceId)) this.tracer.logEvent(traceId, type, data);
    };

    const results: Record<string, ExecutionRecord> = {};
    let failure: { task: string; error: string } | undefined;

    for (const task of this.tasks) {
      const taskContext = context[task.name];
      if (taskContext === undefined) {
        log('task_skipped', { crew: this.name, task: task.name });
        emit({ type: 'task-skipped', crewName: this.name, taskName: task.name, timestamp: isoNow() });
        continue;
      }

      emit({ type: 'task-start', crewName: this.name, taskName: task.name, timestamp: isoNow() });
      const result = await task.agent.execute(
        { ...upstream, ...taskContext },
        { traceId, runId: options.runId },
      );
      const record = result.toRecord();
      results[task.name] = record;
      emit({ type: 'task-complete', crewName: this.name, taskName: task.name, record, timestamp: isoNow() });

      const error = result.isSuccess()
        ? task.postCondition?.(result)
        : (result.errors[0] ?? 'Unknown error');
      if (error !== undefined) {
        failure = { task: task.name, error };
        log('pipeline_abort', { crew: this.name, task: task.name, error });
        break;
      }
    }

    const status: CrewStatus = failure ? 'failed' : 'success';
    const report: CrewReport = {
      crewName: this.name,
      status,
      results,
      ...(failure ? { failedAt: failure.task, error: failure.error } : {}),
      output: this.summarize(results),
      durationMs: monotonicNow() - startTime,
      traceId,
      completedAt: isoNow(),
    };

    if (traceId && this.tracer?.hasTrace(traceId)) {
      if (ownsTrace) {
        this.tracer.completeTrace(traceId);
      } else if (spanId) {
        this.tracer.endSpan(traceId, spanId);
      }
    }

    emit({ type: 'crew-complete', crewName: this.name, report, timestamp: isoNow() });
    return report;
  }
}

/** Report in the snake_case form exchanged with external callers. */
export function toWireReport(report: CrewReport): WireCrewReport {
  return {
    status: report.status,
    results: report.results,
    ...(report.failedAt ? { failed_at: report.failedAt } : {}),
    output: report.output,
  };
}

/** Shallow merge of every object-valued task output, in task order. */
export function mergeOutputs(results: Record<string, ExecutionRecord>): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const record of Object.values(results)) {
    if (isRecord(record.output)) Object.assign(merged, record.output);
  }
  return merged;
}

// ── Data pipeline ────────────────────────────────────────────────

export interface DataPipelineAgents {
  ingestion: ExecutableAgent;
  transformation: ExecutableAgent;
  quality: ExecutableAgent;
}

/** ingestion → transformation → quality, with the quality score as post-condition. */
export class DataPipelineCrew extends Crew {
  runIngestionOnly(input: Record<string, unknown>, options?: KickoffOptions): Promise<CrewReport> {
    return this.kickoff({ ingestion: input }, options);
  }

  runTransformationOnly(input: Record<string, unknown> = {}, options?: KickoffOptions): Promise<CrewReport> {
    return this.kickoff({ transformation: input }, options);
  }

  runQualityCheckOnly(input: Record<string, unknown>, options?: KickoffOptions): Promise<CrewReport> {
    return this.kickoff({ quality: input }, options);
  }
}

export function createDataPipelineCrew(
  agents: DataPipelineAgents,
  options: { qualityThreshold?: number; tracer?: TraceLogger } = {},
): DataPipelineCrew {
  const threshold = options.qualityThreshold ?? QUALITY_THRESHOLD;
  const [ingestion, transformation, quality] = DATA_PIPELINE_TASKS;

  return new DataPipelineCrew({
    name: 'data-pipeline',
    tracer: options.tracer,
    tasks: [
      { name: ingestion, agent: agents.ingestion },
      { name: transformation, agent: agents.transformation },
      {
        name: quality,
        agent: agents.quality,
        postCondition: result => {
          const score = numberField(result.output, 'overall_score') ?? 0;
          return score >= threshold
            ? undefined
            : `Quality score too low: ${(score * 100).toFixed(1)}% (threshold: ${Math.round(threshold * 100)}%)`;
        },
      },
    ],
    summarize: summarizeDataPipeline,
  });
}

function summarizeDataPipeline(results: Record<string, ExecutionRecord>): Record<string, unknown> {
  const summary: Record<string, unknown> = {};
  const ingestion = results.ingestion?.output;
  const transformation = results.transformation?.output;
  const quality = results.quality?.output;

  const rowsIngested = numberField(ingestion, 'rows_ingested');
  const rowsFailed = numberField(ingestion, 'rows_failed');
  const qualityScore = numberField(quality, 'overall_score');
  if (rowsIngested !== undefined) summary.rows_ingested = rowsIngested;
  if (rowsFailed !== undefined) summary.rows_failed = rowsFailed;
  if (isRecord(transformation) && Array.isArray(transformation.models)) {
    summary.models_run = transformation.models.length;
  }
  if (qualityScore !== undefined) summary.quality_score = qualityScore;
  return summary;
}

// ── Model development & deployment ───────────────────────────────

export function createModelDevelopmentCrew(
  agents: { training: ExecutableAgent; evaluation: ExecutableAgent },
  options: { tracer?: TraceLogger } = {},
): Crew {
  const [training, evaluation] = MODEL_DEVELOPMENT_TASKS;
  return new Crew({
    name: 'model-development',
    tracer: options.tracer,
    tasks: [
      { name: training, agent: agents.training },
      { name: evaluation, agent: agents.evaluation },
    ],
  });
}

export function createDeploymentCrew(
  agents: { deployment: ExecutableAgent; monitoring: ExecutableAgent },
  options: { tracer?: TraceLogger } = {},
): Crew {
  const [deployment, monitoring] = DEPLOYMENT_TASKS;
  return new Crew({
    name: 'deployment',
    tracer: options.tracer,
    tasks: [
      { name: deployment, agent: agents.deployment },
      { name: monitoring, agent: agents.monitoring },
    ],
  });
}
