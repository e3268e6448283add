import { z } from 'zod';

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const databaseConfigSchema = z.object({
  path: z.string().min(1).default('.crewline/crewline.db'),
  warehousePath: z.string().min(1).default('.crewline/warehouse'),
});

export const ingestionConfigSchema = z.object({
  batchSize: z.number().int().positive().default(10_000),
  maxRetries: z.number().int().min(1).max(10).default(3),
  backoffBaseMs: z.number().int().min(0).default(1000),
  checkpointStore: z.enum(['file', 'database']).default('file'),
});

export const transformationConfigSchema = z.object({
  executable: z.string().min(1).default('dbt'),
  projectDir: z.string().min(1).default('./dbt_project'),
});

export const qualityConfigSchema = z.object({
  threshold: z.number().min(0).max(1).default(0.9),
  keyColumn: z.string().min(1).optional(),
});

export const gateConfigSchema = z.object({
  metric: z.string().min(1),
  threshold: z.number(),
});

export const stageCommandConfigSchema = z.object({
  name: z.string().min(1),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  cwd: z.string().optional(),
});

export const workflowConfigSchema = z.object({
  gates: z.object({
    dataPipeline: gateConfigSchema.default({ metric: 'quality_score', threshold: 0.9 }),
    modelDevelopment: gateConfigSchema.default({ metric: 'auroc', threshold: 0.8 }),
  }).default({}),
  modelDevelopment: z.array(stageCommandConfigSchema).default([]),
  deployment: z.array(stageCommandConfigSchema).default([]),
});

export const agentsConfigSchema = z.object({
  historyLimit: z.number().int().min(1).default(100),
});

export const loggingConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  traceOutput: z.enum(['memory', 'database']).default('database'),
});

export const crewlineConfigSchema = z.object({
  database: databaseConfigSchema.default({}),
  ingestion: ingestionConfigSchema.default({}),
  transformation: transformationConfigSchema.default({}),
  quality: qualityConfigSchema.default({}),
  workflow: workflowConfigSchema.default({}),
  agents: agentsConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});
