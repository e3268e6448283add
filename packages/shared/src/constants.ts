import type { CrewlineConfig } from './types/config.js';
import type { StageName } from './types/workflow.js';

export const DEFAULT_BATCH_SIZE = 10_000;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BACKOFF_BASE_MS = 1000;
export const DEFAULT_HISTORY_LIMIT = 100;

/** Minimum overall score for the data-pipeline quality task */
export const QUALITY_THRESHOLD = 0.9;
/** Minimum model performance before deployment proceeds */
export const MODEL_PERFORMANCE_THRESHOLD = 0.8;

export const DATA_PIPELINE_TASKS = ['ingestion', 'transformation', 'quality'] as const;
export const MODEL_DEVELOPMENT_TASKS = ['training', 'evaluation'] as const;
export const DEPLOYMENT_TASKS = ['deployment', 'monitoring'] as const;

export const WORKFLOW_STAGES: readonly StageName[] = ['data-pipeline', 'model-development', 'deployment'];

export const DEFAULT_CONFIG: CrewlineConfig = {
  database: {
    path: '.crewline/crewline.db',
    warehousePath: '.crewline/warehouse',
  },
  ingestion: {
    batchSize: DEFAULT_BATCH_SIZE,
    maxRetries: DEFAULT_MAX_RETRIES,
    backoffBaseMs: DEFAULT_BACKOFF_BASE_MS,
    checkpointStore: 'file',
  },
  transformation: {
    executable: 'dbt',
    projectDir: './dbt_project',
  },
  quality: {
    threshold: QUALITY_THRESHOLD,
  },
  workflow: {
    gates: {
      dataPipeline: { metric: 'quality_score', threshold: QUALITY_THRESHOLD },
      modelDevelopment: { metric: 'auroc', threshold: MODEL_PERFORMANCE_THRESHOLD },
    },
    modelDevelopment: [],
    deployment: [],
  },
  agents: {
    historyLimit: DEFAULT_HISTORY_LIMIT,
  },
  logging: {
    level: 'info',
    traceOutput: 'database',
  },
};
