import { z } from 'zod';
import { isQualifiedTableName } from '../utils/table-ref.js';

const qualifiedTableName = (field: string) =>
  z.string().refine(isQualifiedTableName, {
    message: `${field} must include schema (e.g., raw.icustays)`,
  });

/** Input of the ingestion task. */
export const ingestionInputSchema = z.object({
  source_file: z.string().min(1),
  target_table: qualifiedTableName('target_table'),
  batch_size: z.number().int().positive().optional(),
  checkpoint_file: z.string().min(1).optional(),
});

/** Input of the transformation task. */
export const transformationInputSchema = z.object({
  command: z.string().min(1).default('run'),
  models: z.array(z.string().min(1)).default([]),
  vars: z.record(z.string(), z.unknown()).optional(),
});

export const qualityCheckNameSchema = z.enum(['completeness', 'uniqueness']);

/** Input of the quality task. */
export const qualityInputSchema = z.object({
  table_name: qualifiedTableName('table_name'),
  checks: z.array(qualityCheckNameSchema).min(1).default(['completeness', 'uniqueness']),
  key_column: z.string().min(1).optional(),
});

/** Input of a generic command task: any JSON object is forwarded. */
export const commandInputSchema = z.record(z.string(), z.unknown());

export type IngestionInput = z.infer<typeof ingestionInputSchema>;
export type TransformationInput = z.infer<typeof transformationInputSchema>;
export type QualityInput = z.infer<typeof qualityInputSchema>;
export type CommandInput = z.infer<typeof commandInputSchema>;

/** Whole crew context: task name → task input object. */
export const crewContextSchema = z.record(z.string(), z.record(z.string(), z.unknown()));

export const workflowContextSchema = z.object({
  'data-pipeline': crewContextSchema.optional(),
  'model-development': crewContextSchema.optional(),
  deployment: crewContextSchema.optional(),
});
