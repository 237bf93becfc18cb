/**
 * timespan-parse/result
 *
 * Result primitives used by every parsing stage. Failures travel as values;
 * nothing in the parsing pipeline throws past `from()`.
 */

// =============================================================================
// Core Result Types
// =============================================================================

/**
 * A successful computation.
 * Use `ok(value)` to create instances.
 */
export type Ok<T> = { ok: true; value: T };

/**
 * A failed computation.
 * Use `err(error)` to create instances.
 */
export type Err<E, C = unknown> = { ok: false; error: E; cause?: C };

export type Result<T, E = unknown, C = unknown> = Ok<T> | Err<E, C>;

// =============================================================================
// Constructors
// =============================================================================

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

/**
 * Creates a failed Result. `cause` is only set when provided, so two errs
 * built from the same error compare equal with `toEqual`.
 */
export const err = <E, C = unknown>(
  error: E,
  options?: { cause?: C }
): Err<E, C> =>
  options?.cause !== undefined
    ? { ok: false, error, cause: options.cause }
    : { ok: false, error };

// =============================================================================
// Type Guards
// =============================================================================

export const isOk = <T, E, C>(r: Result<T, E, C>): r is Ok<T> => r.ok;

export const isErr = <T, E, C>(r: Result<T, E, C>): r is Err<E, C> => !r.ok;

// =============================================================================
// Transformers
// =============================================================================

/**
 * Transforms the value inside an Ok result.
 */
export function map<T, U>(r: Ok<T>, fn: (value: T) => U): Ok<U>;
export function map<T, U, E, C>(r: Err<E, C>, fn: (value: T) => U): Err<E, C>;
export function map<T, U, E, C>(
  r: Result<T, E, C>,
  fn: (value: T) => U
): Result<U, E, C>;
export function map<T, U, E, C>(
  r: Result<T, E, C>,
  fn: (value: T) => U
): Result<U, E, C> {
  return r.ok ? ok(fn(r.value)) : r;
}

/**
 * Transforms the error inside an Err result. The cause is carried over.
 */
export function mapError<T, E, F, C>(
  r: Ok<T>,
  fn: (error: E, cause?: C) => F
): Ok<T>;
export function mapError<T, E, F, C>(
  r: Err<E, C>,
  fn: (error: E, cause?: C) => F
): Err<F, C>;
export function mapError<T, E, F, C>(
  r: Result<T, E, C>,
  fn: (error: E, cause?: C) => F
): Result<T, F, C>;
export function mapError<T, E, F, C>(
  r: Result<T, E, C>,
  fn: (error: E, cause?: C) => F
): Result<T, F, C> {
  return r.ok ? r : err(fn(r.error, r.cause), { cause: r.cause });
}

/**
 * Chains a Result-returning function onto an Ok value.
 */
export function andThen<T, U>(r: Ok<T>, fn: (value: T) => Ok<U>): Ok<U>;
export function andThen<T, F, C2>(
  r: Ok<T>,
  fn: (value: T) => Err<F, C2>
): Err<F, C2>;
export function andThen<T, U, F, C2>(
  r: Ok<T>,
  fn: (value: T) => Result<U, F, C2>
): Result<U, F, C2>;
export function andThen<T, U, E, F, C1, C2>(
  r: Err<E, C1>,
  fn: (value: T) => Result<U, F, C2>
): Err<E, C1>;
export function andThen<T, U, E, F, C1, C2>(
  r: Result<T, E, C1>,
  fn: (value: T) => Result<U, F, C2>
): Result<U, E | F, C1 | C2>;
export function andThen<T, U, E, F, C1, C2>(
  r: Result<T, E, C1>,
  fn: (value: T) => Result<U, F, C2>
): Result<U, E | F, C1 | C2> {
  return r.ok ? fn(r.value) : r;
}

/**
 * Pattern match on a Result.
 */
export function match<T, E, C, R>(
  r: Result<T, E, C>,
  handlers: { ok: (value: T) => R; err: (error: E, cause?: C) => R }
): R {
  return r.ok ? handlers.ok(r.value) : handlers.err(r.error, r.cause);
}

// =============================================================================
// Unwrap / Wrap
// =============================================================================

/**
 * Extracts the value from an Ok result, or returns `defaultValue` for an Err.
 */
export const unwrapOr = <T, E, C>(r: Result<T, E, C>, defaultValue: T): T =>
  r.ok ? r.value : defaultValue;

/**
 * Runs a function that might throw and captures the outcome as a Result.
 * `onError` maps the thrown value; the raw value is kept as `cause`.
 */
export function from<T, E>(
  fn: () => T,
  onError: (cause: unknown) => E
): Result<T, E, unknown> {
  try {
    return ok(fn());
  } catch (cause) {
    return err(onError(cause), { cause });
  }
}
