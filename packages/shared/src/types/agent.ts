/**
 * Lifecycle states of an agent.
 * Agents progress: idle → running → success/failed.
 * `paused` is reserved for suspension support and is never entered today.
 */
export type AgentStatus = 'idle' | 'running' | 'success' | 'failed' | 'paused';

/** Plain-map form of an ExecutionResult, as embedded in crew reports. */
export interface ExecutionRecord {
  status: AgentStatus;
  output: unknown;
  metrics: Record<string, number>;
  errors: string[];
  metadata: Record<string, unknown>;
  timestamp: string;
}

/** Outcome of validating an agent's input context. */
export type ValidationOutcome<T> =
  | { valid: true; errors: []; value: T }
  | { valid: false; errors: string[] };

/**
 * Tagged result returned by an agent's core logic.
 * Expected failures are reported here instead of being thrown.
 */
export type CoreOutcome<T> =
  | { ok: true; output: T; metrics?: Record<string, number> }
  | { ok: false; errors: string[] };

export interface AgentRunOptions {
  /** Trace to log lifecycle events into */
  traceId?: string;
  /** Run identifier forwarded to the execution sink */
  runId?: string;
}

/** Persisted execution entry (append-only history). */
export interface AgentExecutionEntry {
  id?: number;
  runId: string;
  agentName: string;
  record: ExecutionRecord;
}
