/**
 * Result of an operation that may succeed, succeed with a degraded value, or fail.
 *
 * Read paths return `ok` or `degraded` so callers can tell "empty because
 * nothing matched" apart from "empty because the backend errored".
 */
export interface Ok<T> {
  readonly status: 'ok';
  readonly value: T;
}

export interface Degraded<T> {
  readonly status: 'degraded';
  readonly value: T;
  readonly reason: string;
}

export interface Failed<E extends Error = Error> {
  readonly status: 'failed';
  readonly error: E;
}

export type Outcome<T, E extends Error = Error> = Ok<T> | Degraded<T> | Failed<E>;

/** Outcome of a read path, which never hard-fails */
export type SoftOutcome<T> = Ok<T> | Degraded<T>;

export function ok<T>(value: T): Ok<T> {
  return { status: 'ok', value };
}

export function degraded<T>(value: T, reason: string): Degraded<T> {
  return { status: 'degraded', value, reason };
}

export function failed<E extends Error>(error: E): Failed<E> {
  return { status: 'failed', error };
}
