import { describe, it, expect } from 'vitest';
import type { StageResult, TraceEvent } from '@crewline/shared';
import { Crew } from '../src/crew.js';
import { WorkflowOrchestrator, evaluateGate } from '../src/workflow-orchestrator.js';
import { TraceLogger } from '../src/trace-logger.js';
import { StubAgent, failing, succeeding } from './fakes.js';

function singleTaskCrew(name: string, agent: StubAgent): Crew {
  return new Crew({ name, tasks: [{ name: agent.name, agent }] });
}

function workflow(options: { quality?: number; auroc?: number; failModelDevelopment?: boolean } = {}) {
  const agents = {
    pipeline: succeeding('quality', { quality_score: options.quality ?? 0.95 }),
    training: options.failModelDevelopment
      ? failing('training', 'training crashed')
      : succeeding('training', { auroc: options.auroc ?? 0.86 }),
    deployment: succeeding('deployment', { endpoint: 'models/v1' }),
  };
  const orchestrator = WorkflowOrchestrator.standard({
    dataPipeline: singleTaskCrew('data-pipeline', agents.pipeline),
    modelDevelopment: singleTaskCrew('model-development', agents.training),
    deployment: singleTaskCrew('deployment', agents.deployment),
  });
  return { agents, orchestrator };
}

const contexts = {
  'data-pipeline': { quality: {} },
  'model-development': { training: {} },
  deployment: { deployment: {} },
};

describe('WorkflowOrchestrator', () => {
  it('runs all stages when every gate passes', async () => {
    const { agents, orchestrator } = workflow();

    const report = await orchestrator.execute(contexts);

    expect(report.workflowStatus).toBe('success');
    expect(report.stages.map(s => s.stage)).toEqual(['data-pipeline', 'model-development', 'deployment']);
    expect(report.skipped).toEqual([]);
    expect(report.crewsExecuted).toBe(3);
    expect(report.crewsSucceeded).toBe(3);
    expect(report.crewsFailed).toBe(0);
    expect(report.stoppedAt).toBeUndefined();
    expect(agents.deployment.calls).toBe(1);
  });

  it('stops with partial_success when data quality misses the gate', async () => {
    const { agents, orchestrator } = workflow({ quality: 0.85 });

    const report = await orchestrator.execute(contexts);

    expect(report.workflowStatus).toBe('partial_success');
    expect(report.stoppedAt).toBe('data-pipeline');
    expect(report.skipped).toEqual(['model-development', 'deployment']);
    expect(report.stages[0].gate).toEqual({ metric: 'quality_score', threshold: 0.9, value: 0.85, passed: false });
    expect(agents.training.calls).toBe(0);
    expect(agents.deployment.calls).toBe(0);
  });

  it('stops with partial_success when model performance misses the gate', async () => {
    const { agents, orchestrator } = workflow({ auroc: 0.75 });

    const report = await orchestrator.execute(contexts);

    expect(report.workflowStatus).toBe('partial_success');
    expect(report.stoppedAt).toBe('model-development');
    expect(report.skipped).toEqual(['deployment']);
    expect(agents.deployment.calls).toBe(0);
  });

  it('fails when a crew fails', async () => {
    const { agents, orchestrator } = workflow({ failModelDevelopment: true });

    const report = await orchestrator.execute(contexts);

    expect(report.workflowStatus).toBe('failed');
    expect(report.stages[1]).toMatchObject({
      stage: 'model-development',
      status: 'failed',
      failedAt: 'training',
      error: 'training crashed',
    });
    expect(report.crewsSucceeded).toBe(1);
    expect(report.crewsFailed).toBe(1);
    expect(agents.deployment.calls).toBe(0);
  });

  it('feeds each stage the previous stage output', async () => {
    const { agents, orchestrator } = workflow();

    await orchestrator.execute(contexts);

    expect(agents.training.contexts).toEqual([{ quality_score: 0.95 }]);
    expect(agents.deployment.contexts).toEqual([{ auroc: 0.86 }]);
  });

  it('treats a missing stage context as empty and its metric as 0', async () => {
    const { agents, orchestrator } = workflow();

    const report = await orchestrator.execute({ 'data-pipeline': { quality: {} } });

    expect(agents.training.calls).toBe(0);
    expect(report.workflowStatus).toBe('partial_success');
    expect(report.stages[1].gate?.value).toBe(0);
  });

  it('reports each stage as it finishes', async () => {
    const seen: StageResult[] = [];
    const { orchestrator } = workflow({ auroc: 0.5 });

    await orchestrator.execute(contexts, { onStage: s => { seen.push(s); } });

    expect(seen.map(s => [s.stage, s.gate?.passed])).toEqual([
      ['data-pipeline', true],
      ['model-development', false],
    ]);
  });

  it('logs gate decisions into the workflow trace', async () => {
    const events: TraceEvent[] = [];
    const tracer = new TraceLogger({ listener: e => { events.push(e); } });
    const orchestrator = WorkflowOrchestrator.standard(
      {
        dataPipeline: singleTaskCrew('data-pipeline', succeeding('quality', { quality_score: 0.85 })),
        modelDevelopment: singleTaskCrew('model-development', succeeding('training')),
        deployment: singleTaskCrew('deployment', succeeding('deployment')),
      },
      {},
      tracer,
    );

    const report = await orchestrator.execute(contexts);

    const gates = events.filter(e => e.type === 'decision_gate');
    expect(gates.map(e => e.data)).toEqual([
      { stage: 'data-pipeline', metric: 'quality_score', threshold: 0.9, value: 0.85, passed: false },
    ]);
    expect(gates[0].traceId).toBe(report.traceId);
    expect(tracer.hasTrace(report.traceId)).toBe(false);
  });

  it('uses configured gates', async () => {
    const orchestrator = WorkflowOrchestrator.standard(
      {
        dataPipeline: singleTaskCrew('data-pipeline', succeeding('quality', { quality_score: 0.85 })),
        modelDevelopment: singleTaskCrew('model-development', succeeding('training', { f1: 0.7 })),
        deployment: singleTaskCrew('deployment', succeeding('deployment')),
      },
      { dataPipeline: { metric: 'quality_score', threshold: 0.8 }, modelDevelopment: { metric: 'f1', threshold: 0.6 } },
    );

    expect((await orchestrator.execute(contexts)).workflowStatus).toBe('success');
  });
});

describe('evaluateGate', () => {
  it('counts a non-numeric metric as 0', () => {
    expect(evaluateGate({ metric: 'auroc', threshold: 0.8 }, { auroc: 'high' }))
      .toEqual({ metric: 'auroc', threshold: 0.8, value: 0, passed: false });
  });

  it('passes at exactly the threshold', () => {
    expect(evaluateGate({ metric: 'auroc', threshold: 0.8 }, { auroc: 0.8 }).passed).toBe(true);
  });
});
