/**
 * Tagged success/failure value for calls whose failure is an expected outcome.
 *
 *   const outcome = await fetchTrafficFor(ref);
 *   if (outcome.ok) use(outcome.value); else record(outcome.error);
 */

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
