import type { ExecutionRecord } from './agent.js';

// ============================================================================
// Crew Context
// ============================================================================

/**
 * Task name → input configuration for that task.
 * A task whose key is absent is skipped entirely.
 */
export type CrewContext = Record<string, Record<string, unknown>>;

// ============================================================================
// Crew Reports
// ============================================================================

export type CrewStatus = 'success' | 'failed';

/** Result of one crew kickoff */
export interface CrewReport {
  /** Name of the crew that ran */
  crewName: string;

  /** 'failed' when a task failed or violated its post-condition */
  status: CrewStatus;

  /** Per-task execution records, in execution order */
  results: Record<string, ExecutionRecord>;

  /** Task that aborted the pipeline (only when status is 'failed') */
  failedAt?: string;

  /** First error of the aborting task */
  error?: string;

  /** Crew-level output derived from task outputs (read by decision gates) */
  output: Record<string, unknown>;

  durationMs: number;

  traceId?: string;

  completedAt: string;
}

/** Report shape exchanged with external callers. */
export interface WireCrewReport {
  status: CrewStatus;
  results: Record<string, ExecutionRecord>;
  failed_at?: string;
  output: Record<string, unknown>;
}

// ============================================================================
// Crew Streaming Events
// ============================================================================

export type CrewEventType = 'task-start' | 'task-complete' | 'task-skipped' | 'crew-complete';

/** Emitted while a crew runs */
export interface CrewEvent {
  type: CrewEventType;
  crewName: string;
  taskName?: string;
  record?: ExecutionRecord;
  report?: CrewReport;
  timestamp: string;
}
