import type {
  AgentExecutionEntry,
  CheckpointState,
  CrewReport,
  ExecutionRecord,
  ExecutionTrace,
  GateEvaluation,
  OrchestratorReport,
  StageResult,
  TraceSpan,
} from '@crewline/shared';
import type { TraceSummary } from '@crewline/store';

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  return `${Math.floor(ms / 60000)}m ${Math.round((ms % 60000) / 1000)}s`;
}

/** Integers as is, fractions to at most four decimals. */
export function formatNumber(n: number): string {
  return Number.isInteger(n) ? String(n) : String(Number(n.toFixed(4)));
}

export function formatFields(fields: Record<string, unknown>): string {
  return Object.entries(fields)
    .map(([key, value]) => `${key}=${typeof value === 'number' ? formatNumber(value) : JSON.stringify(value)}`)
    .join(' ');
}

function formatTaskLine(name: string, record: ExecutionRecord): string {
  const metrics = formatFields(record.metrics);
  return `  ${name.padEnd(16)} ${record.status.padEnd(8)}${metrics ? ` ${metrics}` : ''}`.trimEnd();
}

export function formatCrewReport(report: CrewReport): string {
  const lines: string[] = [''];

  if (report.status === 'success') {
    lines.push(`[OK] Crew ${report.crewName} succeeded`);
  } else {
    lines.push(`[FAIL] Crew ${report.crewName} failed at ${report.failedAt ?? 'unknown task'}: ${report.error ?? 'unknown error'}`);
  }

  const tasks = Object.entries(report.results);
  if (tasks.length === 0) {
    lines.push('  (no tasks ran)');
  }
  for (const [name, record] of tasks) {
    lines.push(formatTaskLine(name, record));
    for (const error of record.errors) {
      lines.push(`    ! ${error}`);
    }
  }

  const output = formatFields(report.output);
  if (output) {
    lines.push('');
    lines.push(`Output:   ${output}`);
  }
  lines.push(`Duration: ${formatDuration(report.durationMs)}`);
  if (report.traceId) lines.push(`Trace:    ${report.traceId}`);
  return lines.join('\n');
}

function formatGate(gate: GateEvaluation): string {
  const verdict = gate.passed ? 'passed' : 'failed';
  return `gate ${gate.metric}=${formatNumber(gate.value)} (threshold ${formatNumber(gate.threshold)}) ${verdict}`;
}

function formatStageLine(stage: StageResult): string {
  const parts = [`  ${stage.stage.padEnd(18)} ${stage.status.padEnd(8)}`];
  if (stage.gate) parts.push(formatGate(stage.gate));
  if (stage.failedAt) parts.push(`at ${stage.failedAt}: ${stage.error ?? 'unknown error'}`);
  return parts.join(' ').trimEnd();
}

export function formatWorkflowReport(report: OrchestratorReport): string {
  const lines: string[] = [''];

  switch (report.workflowStatus) {
    case 'success':
      lines.push('[OK] Workflow completed');
      break;
    case 'partial_success':
      lines.push(`[STOPPED] Workflow stopped by policy at ${report.stoppedAt ?? 'unknown stage'}`);
      break;
    case 'failed':
      lines.push(`[FAIL] Workflow failed at ${report.stoppedAt ?? 'unknown stage'}`);
      break;
  }

  for (const stage of report.stages) {
    lines.push(formatStageLine(stage));
  }
  if (report.skipped.length > 0) {
    lines.push(`Skipped:  ${report.skipped.join(', ')}`);
  }

  lines.push('');
  lines.push(`Crews:    ${report.crewsExecuted} executed, ${report.crewsSucceeded} succeeded, ${report.crewsFailed} failed`);
  lines.push(`Duration: ${formatDuration(report.totalDurationMs)}`);
  lines.push(`Trace:    ${report.traceId}`);
  return lines.join('\n');
}

export function formatExecutions(entries: AgentExecutionEntry[]): string {
  if (entries.length === 0) return 'No executions recorded.';

  return entries
    .map(entry => {
      const { record } = entry;
      const detail = record.status === 'failed' ? record.errors.join('; ') : formatFields(record.metrics);
      return `${record.timestamp}  ${entry.agentName.padEnd(16)} ${record.status.padEnd(8)} ${entry.runId}${detail ? `  ${detail}` : ''}`;
    })
    .join('\n');
}

export function formatCheckpoint(id: string, state: CheckpointState | null): string {
  return state ? `${id}: ${state.lastProcessedRow} rows processed` : `${id}: no checkpoint`;
}

function spanDuration(span: TraceSpan): string {
  return span.endTime === undefined ? 'open' : formatDuration(span.endTime - span.startTime);
}

function formatSpan(span: TraceSpan, depth: number, lines: string[]): void {
  const indent = '  '.repeat(depth);
  lines.push(`${indent}${span.name} [${spanDuration(span)}]`);
  for (const event of span.events) {
    const data = formatFields(event.data);
    lines.push(`${indent}  - ${event.type}${data ? ` ${data}` : ''}`);
  }
  for (const child of span.children) {
    formatSpan(child, depth + 1, lines);
  }
}

/** Indented span tree with each span's events. */
export function formatTrace(trace: ExecutionTrace): string {
  const duration = trace.totalDurationMs === undefined ? '' : ` ${formatDuration(trace.totalDurationMs)}`;
  const lines = [`Trace ${trace.traceId} (${trace.subject}) started ${trace.startedAt}${duration}`];
  for (const span of trace.spans) {
    formatSpan(span, 1, lines);
  }
  return lines.join('\n');
}

export function formatTraceList(traces: TraceSummary[]): string {
  if (traces.length === 0) return 'No traces recorded.';
  return traces
    .map(t => {
      const duration = t.durationMs === undefined ? '' : `  ${formatDuration(t.durationMs)}`;
      return `${t.traceId}  ${t.subject.padEnd(24)} ${t.startedAt}${duration}`;
    })
    .join('\n');
}
