import { InvalidArgumentError, type Command } from 'commander';
import { ConfigManager, CrewlineRuntime } from '@crewline/core';
import { errorMessage } from '@crewline/shared';
import { createEventPrinter } from './output/event-printer.js';

export interface GlobalOptions {
  config?: string;
  verbose?: boolean;
}

/**
 * Load configuration, wire a runtime and run `action` with it. The process
 * exit code is 1 when the action reports failure or throws.
 */
export async function withRuntime(
  command: Command,
  action: (runtime: CrewlineRuntime) => Promise<boolean>,
): Promise<void> {
  const globals = command.optsWithGlobals<GlobalOptions>();
  let runtime: CrewlineRuntime | undefined;

  try {
    const config = await new ConfigManager().load({ configPath: globals.config });
    runtime = new CrewlineRuntime(config, {
      listener: createEventPrinter(globals.verbose ? 'debug' : config.logging.level),
    });
    if (!(await action(runtime))) {
      process.exitCode = 1;
    }
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  } finally {
    runtime?.close();
  }
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}
