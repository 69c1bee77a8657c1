/**
 * Result Type
 *
 * Outcome of a step whose failure is an expected value rather than an
 * exception, such as a call expression that turns out not to be a hook
 * dispatch.
 *
 * @module
 */

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
