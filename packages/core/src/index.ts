// ── Agent contract ───────────────────────────────────────────────
export { Agent } from './agent.js';
export type { AgentOptions, ExecutableAgent } from './agent.js';
export { ExecutionResult } from './execution-result.js';
export { ExecutionHistory } from './execution-history.js';
export { succeed, fail, validationSuccess, validationFailure } from './outcome.js';

// ── Agents & capabilities ────────────────────────────────────────
export { IngestionAgent, TransformationAgent, QualityAgent, CommandAgent } from './agents/index.js';
export type {
  IngestionAgentDeps,
  IngestionSettings,
  TransformationSettings,
  QualitySettings,
} from './agents/index.js';
export { FileCheckpointStore } from './checkpoint.js';
export { connectWithRetry, defaultSleep } from './retry.js';
export type { RetryOptions, Sleeper } from './retry.js';
export { LocalFileAccess, SpawnProcessRunner } from './tools/index.js';

// ── Crews & workflow ─────────────────────────────────────────────
export {
  Crew,
  DataPipelineCrew,
  createDataPipelineCrew,
  createModelDevelopmentCrew,
  createDeploymentCrew,
  mergeOutputs,
  toWireReport,
} from './crew.js';
export type {
  CrewTask,
  CrewDefinition,
  CrewSummarizer,
  PostCondition,
  KickoffOptions,
  DataPipelineAgents,
} from './crew.js';
export { WorkflowOrchestrator, evaluateGate } from './workflow-orchestrator.js';
export type { WorkflowStage, WorkflowCrews, WorkflowGates, WorkflowRunOptions } from './workflow-orchestrator.js';

// ── Ambient ──────────────────────────────────────────────────────
export { TraceLogger } from './trace-logger.js';
export type { TraceListener, TraceLoggerOptions } from './trace-logger.js';
export { ConfigManager, CONFIG_FILE_NAMES, deepMerge } from './config-manager.js';
export type { ConfigLoadOptions } from './config-manager.js';
export { CrewlineRuntime } from './runtime.js';
export type { RuntimeOverrides } from './runtime.js';
