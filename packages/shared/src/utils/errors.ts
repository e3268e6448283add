export class CrewlineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CrewlineError';
  }
}

/** Destination unreachable. Retried with backoff before escalating. */
export class ConnectionError extends CrewlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Connection failed: ${message}`, options);
    this.name = 'ConnectionError';
  }
}

/** A single batch could not be committed. Isolated to that batch. */
export class BatchInsertError extends CrewlineError {
  constructor(
    public readonly table: string,
    public readonly rowCount: number,
    options?: { cause?: unknown },
  ) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause ?? 'unknown');
    super(`Batch insert into ${table} failed (${rowCount} rows): ${reason}`, options);
    this.name = 'BatchInsertError';
  }
}

export class CheckpointError extends CrewlineError {
  constructor(
    public readonly checkpointId: string,
    message: string,
  ) {
    super(`Checkpoint ${checkpointId}: ${message}`);
    this.name = 'CheckpointError';
  }
}

export class ConfigError extends CrewlineError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}

/** Message of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
