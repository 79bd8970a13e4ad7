/**
 * Result type for explicit error handling.
 * Errors travel as values across service seams; only contract violations throw.
 */

export type Result<T, E> = Ok<T> | Err<E>;

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

// Runs a throwing function and captures the failure
export const tryCatch = <T, E>(fn: () => T, mapError: (e: unknown) => E): Result<T, E> => {
  try {
    return ok(fn());
  } catch (e) {
    return err(mapError(e));
  }
};

export const tryCatchAsync = async <T, E>(
  fn: () => Promise<T>,
  mapError: (e: unknown) => E
): Promise<Result<T, E>> => {
  try {
    return ok(await fn());
  } catch (e) {
    return err(mapError(e));
  }
};

// Normalizes anything thrown into an Error instance
export const toError = (e: unknown): Error => (e instanceof Error ? e : new Error(String(e)));
