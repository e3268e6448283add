import type { CoreOutcome, ValidationOutcome } from '@crewline/shared';

export function succeed<T>(output: T, metrics?: Record<string, number>): CoreOutcome<T> {
  return metrics ? { ok: true, output, metrics } : { ok: true, output };
}

export function fail<T = never>(...errors: string[]): CoreOutcome<T> {
  return { ok: false, errors };
}

export function validationSuccess<T>(value: T): ValidationOutcome<T> {
  return { valid: true, errors: [], value };
}

export function validationFailure<T = never>(errors: string[]): ValidationOutcome<T> {
  return { valid: false, errors };
}
