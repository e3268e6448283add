import { readFile } from 'node:fs/promises';
import type { z } from 'zod';
import {
  CrewlineError,
  crewContextSchema,
  errorMessage,
  formatIssues,
  workflowContextSchema,
  type CrewContext,
  type WorkflowContext,
} from '@crewline/shared';

async function readContext<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (err) {
    throw new CrewlineError(`Cannot read context file ${path}: ${errorMessage(err)}`, { cause: err });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new CrewlineError(`Invalid context file ${path}: ${formatIssues(parsed.error.issues).join('; ')}`);
  }
  return parsed.data;
}

/** Task name → task input, as read by `crewline pipeline`. */
export function readCrewContext(path: string): Promise<CrewContext> {
  return readContext(path, crewContextSchema);
}

/** Stage name → crew context, as read by `crewline workflow`. */
export function readWorkflowContext(path: string): Promise<WorkflowContext> {
  return readContext(path, workflowContextSchema);
}
