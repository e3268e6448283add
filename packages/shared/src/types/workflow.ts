import type { CrewContext, CrewStatus } from './crew.js';

export type StageName = 'data-pipeline' | 'model-development' | 'deployment';

export type WorkflowStatus = 'success' | 'partial_success' | 'failed';

/**
 * Policy threshold on a numeric field of a crew's output.
 * A stage whose metric is below threshold stops the workflow without failing it.
 */
export interface DecisionGate {
  metric: string;
  threshold: number;
}

/** Per-stage contexts; a missing stage receives an empty context */
export type WorkflowContext = Partial<Record<StageName, CrewContext>>;

export interface StageResult {
  stage: StageName;
  crewName: string;
  status: CrewStatus;
  output: Record<string, unknown>;
  failedAt?: string;
  error?: string;
  durationMs: number;
  /** Gate evaluation, when the stage has one and the crew succeeded */
  gate?: GateEvaluation;
}

export interface GateEvaluation {
  metric: string;
  threshold: number;
  value: number;
  passed: boolean;
}

export interface OrchestratorReport {
  workflowStatus: WorkflowStatus;
  /** Executed stages, in order */
  stages: StageResult[];
  /** Stages never started because of a failure or policy stop */
  skipped: StageName[];
  crewsExecuted: number;
  crewsSucceeded: number;
  crewsFailed: number;
  /** Stage where the workflow stopped early */
  stoppedAt?: StageName;
  totalDurationMs: number;
  traceId: string;
  completedAt: string;
}
