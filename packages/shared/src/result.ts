import { AppError } from './errors';

export interface Ok<T> {
  ok: true;
  value: T;
}

export interface Err<E> {
  ok: false;
  error: E;
}

/**
 * Outcome of an operation that is expected to fail in normal use,
 * such as an external command. Callers branch on `ok` instead of catching.
 */
export type Result<T, E = AppError> = Ok<T> | Err<E>;

export function ok(): Ok<void>;
export function ok<T>(value: T): Ok<T>;
export function ok(value?: unknown): Ok<unknown> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
