// ── Types ────────────────────────────────────────────────────────
export type {
  AgentStatus,
  ExecutionRecord,
  ValidationOutcome,
  CoreOutcome,
  AgentRunOptions,
  AgentExecutionEntry,
} from './types/agent.js';
export type {
  TableRef,
  CsvRecord,
  CheckpointState,
  IngestionSummary,
  QualityCheckName,
  QualityCheckResult,
  QualityReport,
  TransformationOutput,
} from './types/ingestion.js';
export type {
  CrewContext,
  CrewStatus,
  CrewReport,
  WireCrewReport,
  CrewEvent,
  CrewEventType,
} from './types/crew.js';
export type {
  StageName,
  WorkflowStatus,
  DecisionGate,
  WorkflowContext,
  StageResult,
  GateEvaluation,
  OrchestratorReport,
} from './types/workflow.js';
export type { TraceEventType, TraceEvent, TraceSpan, ExecutionTrace } from './types/trace.js';
export type {
  Storage,
  StorageConnection,
  CsvBatchOptions,
  FileAccess,
  CheckpointStore,
  QualityMeasureOptions,
  QualityMetrics,
  ProcessResult,
  ProcessRunOptions,
  ProcessRunner,
  ExecutionSink,
} from './types/capabilities.js';
export type {
  LogLevel,
  DatabaseConfig,
  IngestionConfig,
  TransformationConfig,
  QualityConfig,
  GateConfig,
  StageCommandConfig,
  WorkflowConfig,
  AgentsConfig,
  LoggingConfig,
  CrewlineConfig,
} from './types/config.js';

// ── Schemas ──────────────────────────────────────────────────────
export { crewlineConfigSchema, logLevelSchema } from './schemas/config.schema.js';
export {
  ingestionInputSchema,
  transformationInputSchema,
  qualityInputSchema,
  qualityCheckNameSchema,
  commandInputSchema,
  crewContextSchema,
  workflowContextSchema,
} from './schemas/task-input.schema.js';
export type {
  IngestionInput,
  TransformationInput,
  QualityInput,
  CommandInput,
} from './schemas/task-input.schema.js';

// ── Constants & utilities ────────────────────────────────────────
export * from './constants.js';
export * from './utils/index.js';
