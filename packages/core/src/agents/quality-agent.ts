import {
  QUALITY_THRESHOLD,
  qualityInputSchema,
  parseTableRef,
  type CoreOutcome,
  type QualityCheckName,
  type QualityMetrics,
  type QualityInput,
  type QualityReport,
} from '@crewline/shared';
import { Agent, type AgentOptions } from '../agent.js';
import { fail, succeed } from '../outcome.js';

export interface QualitySettings {
  /** Minimum overall score for `passed` */
  threshold: number;
  keyColumn?: string;
}

/** Scores a table on completeness and uniqueness. */
export class QualityAgent extends Agent<QualityInput, QualityReport> {
  protected readonly inputSchema = qualityInputSchema;
  private readonly settings: QualitySettings;

  constructor(
    private readonly deps: { metrics: QualityMetrics },
    settings: Partial<QualitySettings> = {},
    options: AgentOptions = {},
  ) {
    super('quality', 'Measures data quality of a warehouse table', options);
    this.settings = { threshold: settings.threshold ?? QUALITY_THRESHOLD, keyColumn: settings.keyColumn };
  }

  protected async runCore(input: QualityInput): Promise<CoreOutcome<QualityReport>> {
    const table = parseTableRef(input.table_name);
    if (!table) {
      return fail('table_name must include schema (e.g., raw.icustays)');
    }

    const keyColumn = input.key_column ?? this.settings.keyColumn;
    const checks: QualityReport['checks'] = {};
    const metrics: Record<string, number> = {};
    const names: QualityCheckName[] = [...new Set(input.checks)];

    for (const name of names) {
      const result = await this.deps.metrics.measure(name, table, { keyColumn });
      checks[name] = result;
      metrics[`${name}_score`] = result.score;
    }

    const overall = names.length === 0
      ? 0
      : names.reduce((sum, name) => sum + (checks[name]?.score ?? 0), 0) / names.length;
    metrics.overall_score = overall;

    return succeed(
      {
        table_name: input.table_name,
        checks,
        overall_score: overall,
        passed: overall >= this.settings.threshold,
      },
      metrics,
    );
  }
}
