import {
  commandInputSchema,
  isRecord,
  type CommandInput,
  type CoreOutcome,
  type ProcessRunner,
  type StageCommandConfig,
} from '@crewline/shared';
import { Agent, type AgentOptions } from '../agent.js';
import { fail, succeed } from '../outcome.js';

/**
 * A task backed by an external command. The task context is passed in the
 * CREWLINE_CONTEXT environment variable; the last non-empty stdout line must
 * be a JSON object, which becomes the output. Its numeric fields are also
 * reported as metrics.
 */
export class CommandAgent extends Agent<CommandInput, Record<string, unknown>> {
  protected readonly inputSchema = commandInputSchema;

  constructor(
    name: string,
    private readonly deps: { runner: ProcessRunner },
    private readonly command: StageCommandConfig | undefined,
    options: AgentOptions = {},
  ) {
    super(name, command ? `Runs ${command.command}` : `Unconfigured task ${name}`, options);
  }

  protected override async checkPreconditions(): Promise<string[]> {
    return this.command ? [] : [`No command configured for task ${this.name}`];
  }

  protected async runCore(input: CommandInput): Promise<CoreOutcome<Record<string, unknown>>> {
    if (!this.command) {
      return fail(`No command configured for task ${this.name}`);
    }

    const { command, args, cwd } = this.command;
    const result = await this.deps.runner.run(command, args, {
      cwd,
      env: { CREWLINE_CONTEXT: JSON.stringify(input) },
    });

    if (result.exitCode !== 0) {
      const reason = result.stderr.trim() || `exit code ${result.exitCode}`;
      return fail(`${this.name} command failed: ${reason}`);
    }

    const output = parseLastJsonLine(result.stdout);
    if (!output) {
      return fail(`${this.name} command did not print a JSON object on its last output line`);
    }

    const metrics: Record<string, number> = {};
    for (const [key, value] of Object.entries(output)) {
      if (typeof value === 'number' && Number.isFinite(value)) metrics[key] = value;
    }
    return succeed(output, metrics);
  }
}

function parseLastJsonLine(stdout: string): Record<string, unknown> | null {
  const lines = stdout.split(/\r?\n/).map(line => line.trim()).filter(Boolean);
  const last = lines[lines.length - 1];
  if (!last) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(last);
  } catch {
    return null;
  }
  return isRecord(parsed) ? parsed : null;
}
