/**
 * Result Type
 *
 * A discriminated union for operations that can fail without throwing.
 * Lives in @ali/shared so that every package can return it without
 * depending on @ali/core.
 *
 * @module @ali/shared/types/result
 */

/** Successful outcome carrying a value */
export interface OkResult<T> {
  readonly ok: true;
  readonly value: T;
}

/** Failed outcome carrying an error */
export interface ErrResult<E> {
  readonly ok: false;
  readonly error: E;
}

/**
 * Either a value or an error, discriminated by `ok`.
 *
 * @example
 * ```typescript
 * const result = loadConfig();
 * if (result.ok) {
 *   console.log(result.value.logLevel);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

export function Ok<T>(value: T): OkResult<T> {
  return { ok: true, value };
}

export function Err<E>(error: E): ErrResult<E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is OkResult<T> {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is ErrResult<E> {
  return !result.ok;
}

/**
 * Transforms the value of a successful result, passing errors through.
 */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? Ok(fn(result.value)) : result;
}

/**
 * Transforms the error of a failed result, passing values through.
 */
export function mapErr<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
  return result.ok ? result : Err(fn(result.error));
}

/**
 * Returns the value or throws the error.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error instanceof Error ? result.error : new Error(String(result.error));
}

export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
  return result.ok ? result.value : fallback;
}

/**
 * Runs `fn` and captures a thrown error as an `Err`.
 *
 * @param fn - Function that may throw
 * @param onError - Converts the thrown value into the error type
 */
export function tryCatch<T, E>(fn: () => T, onError: (thrown: unknown) => E): Result<T, E> {
  try {
    return Ok(fn());
  } catch (thrown) {
    return Err(onError(thrown));
  }
}
