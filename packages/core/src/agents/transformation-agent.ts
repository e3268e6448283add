import {
  transformationInputSchema,
  type CoreOutcome,
  type FileAccess,
  type ProcessRunner,
  type TransformationInput,
  type TransformationOutput,
} from '@crewline/shared';
import { Agent, type AgentOptions } from '../agent.js';
import { fail, succeed } from '../outcome.js';

export interface TransformationSettings {
  /** Transformation tool, e.g. `dbt` */
  executable: string;
  projectDir: string;
}

/** Runs the transformation tool over the project's models. */
export class TransformationAgent extends Agent<TransformationInput, TransformationOutput> {
  protected readonly inputSchema = transformationInputSchema;

  constructor(
    private readonly deps: { runner: ProcessRunner; files: FileAccess },
    private readonly settings: TransformationSettings,
    options: AgentOptions = {},
  ) {
    super('transformation', 'Builds warehouse models with the transformation tool', options);
  }

  protected override async checkPreconditions(): Promise<string[]> {
    return (await this.deps.files.exists(this.settings.projectDir))
      ? []
      : [`Project directory not found: ${this.settings.projectDir}`];
  }

  protected async runCore(input: TransformationInput): Promise<CoreOutcome<TransformationOutput>> {
    const args = [input.command];
    if (input.models.length > 0) {
      args.push('--models', input.models.join(' '));
    }
    if (input.vars && Object.keys(input.vars).length > 0) {
      args.push('--vars', JSON.stringify(input.vars));
    }

    const result = await this.deps.runner.run(this.settings.executable, args, {
      cwd: this.settings.projectDir,
    });

    if (result.exitCode !== 0) {
      const reason = result.stderr.trim() || `exit code ${result.exitCode}`;
      return fail(`transformation command failed: ${reason}`);
    }

    return succeed(
      {
        command: input.command,
        success: true,
        stdout: result.stdout,
        stderr: result.stderr,
        return_code: result.exitCode,
        models: input.models,
      },
      { models_run: input.models.length },
    );
  }
}
