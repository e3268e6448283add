import {
  MODEL_PERFORMANCE_THRESHOLD,
  QUALITY_THRESHOLD,
  generateId,
  isoNow,
  monotonicNow,
  numberField,
  type CrewEvent,
  type DecisionGate,
  type GateEvaluation,
  type OrchestratorReport,
  type StageName,
  type StageResult,
  type WorkflowContext,
  type WorkflowStatus,
} from '@crewline/shared';
import type { Crew } from './crew.js';
import type { TraceLogger } from './trace-logger.js';

export interface WorkflowStage {
  name: StageName;
  crew: Crew;
  /** Policy check on the crew's output; failing it stops the workflow */
  gate?: DecisionGate;
}

export interface WorkflowCrews {
  dataPipeline: Crew;
  modelDevelopment: Crew;
  deployment: Crew;
}

export interface WorkflowGates {
  dataPipeline?: DecisionGate;
  modelDevelopment?: DecisionGate;
}

export interface WorkflowRunOptions {
  runId?: string;
  onEvent?: (event: CrewEvent) => void;
  onStage?: (result: StageResult) => void;
}

/** Evaluate a gate; a missing or non-numeric metric counts as 0. */
export function evaluateGate(gate: DecisionGate, output: Record<string, unknown>): GateEvaluation {
  const value = numberField(output, gate.metric) ?? 0;
  return { metric: gate.metric, threshold: gate.threshold, value, passed: value >= gate.threshold };
}

/**
 * Runs stage crews in order, feeding each stage the previous stage's output.
 * A failed crew fails the workflow; a failed gate stops it as partial success.
 */
export class WorkflowOrchestrator {
  private readonly stages: readonly WorkflowStage[];

  constructor(stages: WorkflowStage[], private readonly tracer?: TraceLogger) {
    this.stages = [...stages];
  }

  /** The standard three-stage workflow with its default gates. */
  static standard(crews: WorkflowCrews, gates: WorkflowGates = {}, tracer?: TraceLogger): WorkflowOrchestrator {
    return new WorkflowOrchestrator(
      [
        {
          name: 'data-pipeline',
          crew: crews.dataPipeline,
          gate: gates.dataPipeline ?? { metric: 'quality_score', threshold: QUALITY_THRESHOLD },
        },
        {
          name: 'model-development',
          crew: crews.modelDevelopment,
          gate: gates.modelDevelopment ?? { metric: 'auroc', threshold: MODEL_PERFORMANCE_THRESHOLD },
        },
        { name: 'deployment', crew: crews.deployment },
      ],
      tracer,
    );
  }

  get stageNames(): StageName[] {
    return this.stages.map(s => s.name);
  }

  async execute(contexts: WorkflowContext = {}, options: WorkflowRunOptions = {}): Promise<OrchestratorReport> {
    const startTime = monotonicNow();
    const traceId = this.tracer?.createTrace('workflow') ?? generateId('trace');
    const log = (type: 'info' | 'decision_gate' | 'pipeline_abort', data: Record<string, unknown>): void => {
      if (this.tracer?.hasTrace(traceId)) this.tracer.logEvent(traceId, type, data);
    };

    const results: StageResult[] = [];
    let workflowStatus: WorkflowStatus = 'success';
    let stoppedAt: StageName | undefined;
    let upstream: Record<string, unknown> = {};

    for (const stage of this.stages) {
      const report = await stage.crew.kickoff(contexts[stage.name] ?? {}, {
        upstream,
        traceId: this.tracer ? traceId : undefined,
        runId: options.runId,
        onEvent: options.onEvent,
      });

      const result: StageResult = {
        stage: stage.name,
        crewName: report.crewName,
        status: report.status,
        output: report.output,
        ...(report.failedAt ? { failedAt: report.failedAt } : {}),
        ...(report.error ? { error: report.error } : {}),
        durationMs: report.durationMs,
      };
      results.push(result);

      if (report.status === 'failed') {
        log('pipeline_abort', { stage: stage.name, failedAt: report.failedAt, error: report.error });
        options.onStage?.(result);
        workflowStatus = 'failed';
        stoppedAt = stage.name;
        break;
      }

      if (stage.gate) {
        const gate = evaluateGate(stage.gate, report.output);
        result.gate = gate;
        log('decision_gate', { stage: stage.name, ...gate });
        if (!gate.passed) {
          options.onStage?.(result);
          workflowStatus = 'partial_success';
          stoppedAt = stage.name;
          break;
        }
      }

      options.onStage?.(result);
      upstream = report.output;
    }

    const executed = new Set(results.map(r => r.stage));
    const crewsSucceeded = results.filter(r => r.status === 'success').length;
    const report: OrchestratorReport = {
      workflowStatus,
      stages: results,
      skipped: this.stages.map(s => s.name).filter(name => !executed.has(name)),
      crewsExecuted: results.length,
      crewsSucceeded,
      crewsFailed: results.length - crewsSucceeded,
      ...(stoppedAt ? { stoppedAt } : {}),
      totalDurationMs: monotonicNow() - startTime,
      traceId,
      completedAt: isoNow(),
    };

    log('info', { workflowStatus, crewsExecuted: report.crewsExecuted });
    if (this.tracer?.hasTrace(traceId)) {
      this.tracer.completeTrace(traceId);
    }
    return report;
  }
}
