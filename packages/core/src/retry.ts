import { ConnectionError } from '@crewline/shared';

export type Sleeper = (ms: number) => Promise<void>;

export const defaultSleep: Sleeper = (ms) => new Promise(resolve => setTimeout(resolve, ms));

export interface RetryOptions {
  /** Total attempts, at least 1 */
  maxRetries: number;
  /** Delay after failed attempt i is backoffBaseMs * 2^i */
  backoffBaseMs: number;
  sleep?: Sleeper;
  onRetry?: (attempt: number, delayMs: number, error: ConnectionError) => void;
}

/**
 * Open a connection, retrying only on ConnectionError with exponential
 * backoff. Other faults, and the fault of the last attempt, propagate.
 */
export async function connectWithRetry<T>(connect: () => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, options.maxRetries);
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await connect();
    } catch (err) {
      if (!(err instanceof ConnectionError) || attempt >= attempts - 1) {
        throw err;
      }
      const delayMs = options.backoffBaseMs * 2 ** attempt;
      options.onRetry?.(attempt, delayMs, err);
      await sleep(delayMs);
    }
  }
}
