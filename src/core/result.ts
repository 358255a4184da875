/**
 * Outcome of an operation that crosses a component boundary. Remote calls,
 * per-ref exports and per-ref pushes return one of these instead of throwing,
 * so the protocol loop never sees an unclassified exception.
 */
export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function mapResult<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? ok(fn(result.value)) : result;
}
