/**
 * Three-state value used wherever a computed input can be missing.
 *
 * ABSENT and INVALID are never coerced to zero: consumers must branch on
 * `status` and exclude the value.
 */

import { errorMessage, InsufficientDataError, MissingSentimentError } from './errors.js';

export type Reading<T> =
  | { status: 'PRESENT'; value: T }
  | { status: 'ABSENT'; reason: string; code?: string; required?: number; actual?: number }
  | { status: 'INVALID'; reason: string };

/** Shortfalls that make a value ABSENT rather than INVALID. */
export type RecoverableError = InsufficientDataError | MissingSentimentError;

export function present<T>(value: T): Reading<T> {
  return { status: 'PRESENT', value };
}

export function absent<T>(reason: string, required?: number, actual?: number): Reading<T> {
  return { status: 'ABSENT', reason, required, actual };
}

export function invalid<T>(reason: string): Reading<T> {
  return { status: 'INVALID', reason };
}

export function absentFrom<T>(err: RecoverableError): Reading<T> {
  if (err instanceof InsufficientDataError) {
    return { status: 'ABSENT', reason: err.message, code: err.code, required: err.required, actual: err.actual };
  }
  return { status: 'ABSENT', reason: err.message, code: err.code };
}

export function isRecoverable(err: unknown): err is RecoverableError {
  return err instanceof InsufficientDataError || err instanceof MissingSentimentError;
}

/**
 * Runs a component. A thrown shortfall becomes ABSENT; anything else
 * thrown becomes INVALID.
 */
export function attemptReading<T>(fn: () => Reading<T>): Reading<T> {
  try {
    return fn();
  } catch (err) {
    return isRecoverable(err) ? absentFrom(err) : invalid(errorMessage(err));
  }
}

/** Value or undefined; for display and optional facts only, never for scoring. */
export function valueOf<T>(r: Reading<T>): T | undefined {
  return r.status === 'PRESENT' ? r.value : undefined;
}

export function mapReading<T, U>(r: Reading<T>, fn: (value: T) => U): Reading<U> {
  return r.status === 'PRESENT' ? { status: 'PRESENT', value: fn(r.value) } : r;
}
