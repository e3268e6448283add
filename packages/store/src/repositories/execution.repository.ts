import type Database from 'better-sqlite3';
import type { AgentExecutionEntry, AgentStatus, ExecutionRecord, ExecutionSink } from '@crewline/shared';
import { parseObjectColumn } from './json.js';

interface ExecutionRow {
  id: number;
  run_id: string;
  agent_name: string;
  status: string;
  output: string | null;
  metrics: string;
  errors: string;
  metadata: string;
  timestamp: string;
}

type ExecutionInsert = Omit<ExecutionRow, 'id'>;

export interface ExecutionListOptions {
  agentName?: string;
  runId?: string;
  limit?: number;
}

const STATUSES: ReadonlySet<string> = new Set<AgentStatus>(['idle', 'running', 'success', 'failed', 'paused']);

function isAgentStatus(value: string): value is AgentStatus {
  return STATUSES.has(value);
}

/**
 * Append-only store of agent execution results.
 * Doubles as the execution sink agents write through.
 */
export class ExecutionRepository implements ExecutionSink {
  private insertStmt: Database.Statement<[ExecutionInsert]>;
  private countStmt: Database.Statement<[], { n: number }>;
  private countByAgentStmt: Database.Statement<[string], { n: number }>;

  constructor(private db: Database.Database) {
    this.insertStmt = db.prepare<[ExecutionInsert]>(`
      INSERT INTO agent_executions (run_id, agent_name, status, output, metrics, errors, metadata, timestamp)
      VALUES (@run_id, @agent_name, @status, @output, @metrics, @errors, @metadata, @timestamp)
    `);
    this.countStmt = db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM agent_executions');
    this.countByAgentStmt = db.prepare<[string], { n: number }>(
      'SELECT COUNT(*) AS n FROM agent_executions WHERE agent_name = ?',
    );
  }

  append(entry: AgentExecutionEntry): void {
    const { record } = entry;
    this.insertStmt.run({
      run_id: entry.runId,
      agent_name: entry.agentName,
      status: record.status,
      output: record.output === undefined ? null : JSON.stringify(record.output),
      metrics: JSON.stringify(record.metrics),
      errors: JSON.stringify(record.errors),
      metadata: JSON.stringify(record.metadata),
      timestamp: record.timestamp,
    });
  }

  /** Newest first. */
  list(options: ExecutionListOptions = {}): AgentExecutionEntry[] {
    const clauses: string[] = [];
    const params: Array<string | number> = [];

    if (options.agentName) {
      clauses.push('agent_name = ?');
      params.push(options.agentName);
    }
    if (options.runId) {
      clauses.push('run_id = ?');
      params.push(options.runId);
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    params.push(options.limit ?? 50);

    return this.db
      .prepare<Array<string | number>, ExecutionRow>(
        `SELECT * FROM agent_executions ${where} ORDER BY id DESC LIMIT ?`,
      )
      .all(...params)
      .map(rowToEntry);
  }

  count(agentName?: string): number {
    const row = agentName ? this.countByAgentStmt.get(agentName) : this.countStmt.get();
    return row?.n ?? 0;
  }
}

function rowToEntry(row: ExecutionRow): AgentExecutionEntry {
  const errors: unknown = JSON.parse(row.errors);
  const record: ExecutionRecord = {
    status: isAgentStatus(row.status) ? row.status : 'failed',
    output: row.output === null ? null : JSON.parse(row.output),
    metrics: toMetrics(parseObjectColumn(row.metrics)),
    errors: Array.isArray(errors) ? errors.map(String) : [],
    metadata: parseObjectColumn(row.metadata),
    timestamp: row.timestamp,
  };
  return { id: row.id, runId: row.run_id, agentName: row.agent_name, record };
}

function toMetrics(raw: Record<string, unknown>): Record<string, number> {
  const metrics: Record<string, number> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'number') metrics[key] = value;
  }
  return metrics;
}
