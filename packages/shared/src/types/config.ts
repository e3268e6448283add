export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface DatabaseConfig {
  /** SQLite file holding execution history, checkpoints and traces */
  path: string;
  /** Directory of the warehouse databases (one file per schema) */
  warehousePath: string;
}

export interface IngestionConfig {
  batchSize: number;
  maxRetries: number;
  /** Base of the 2^attempt backoff between connection attempts */
  backoffBaseMs: number;
  /** Where checkpoints live: JSON files named by the id, or the state database */
  checkpointStore: 'file' | 'database';
}

export interface TransformationConfig {
  executable: string;
  projectDir: string;
}

export interface QualityConfig {
  /** Minimum overall score for the quality task to pass */
  threshold: number;
  keyColumn?: string;
}

export interface GateConfig {
  metric: string;
  threshold: number;
}

/** External command run as one task of a model-development or deployment crew */
export interface StageCommandConfig {
  name: string;
  command: string;
  args: string[];
  cwd?: string;
}

export interface WorkflowConfig {
  gates: {
    dataPipeline: GateConfig;
    modelDevelopment: GateConfig;
  };
  modelDevelopment: StageCommandConfig[];
  deployment: StageCommandConfig[];
}

export interface AgentsConfig {
  /** Execution results retained in memory per agent */
  historyLimit: number;
}

export interface LoggingConfig {
  level: LogLevel;
  traceOutput: 'memory' | 'database';
}

export interface CrewlineConfig {
  database: DatabaseConfig;
  ingestion: IngestionConfig;
  transformation: TransformationConfig;
  quality: QualityConfig;
  workflow: WorkflowConfig;
  agents: AgentsConfig;
  logging: LoggingConfig;
}
