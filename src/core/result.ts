/**
 * Explicit outcomes for tracker operations. Nothing past a request boundary
 * throws; callers switch on `error.kind`.
 */

export type FailureKind = 'validation' | 'not_found' | 'persistence';

export interface Failure {
  kind: FailureKind;
  message: string;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: Failure };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: FailureKind, message: string): Result<T> {
  return { ok: false, error: { kind, message } };
}

export function validationError<T = never>(message: string): Result<T> {
  return fail<T>('validation', message);
}

export function notFound<T = never>(message: string): Result<T> {
  return fail<T>('not_found', message);
}

export function persistenceError<T = never>(message: string): Result<T> {
  return fail<T>('persistence', message);
}
