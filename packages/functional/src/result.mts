/**
 * @module result
 * @description The two-variant outcome value returned by every protected
 * execution. A Result holds exactly one of a success value or an error value
 * and is never mutated after construction.
 *
 * @example
 * ```typescript
 * import { Result } from '@bulwark/functional';
 *
 * function parsePort(raw: string): Result<number, string> {
 *   const port = Number(raw);
 *   return Number.isInteger(port) ? Result.ok(port) : Result.err(`bad port: ${raw}`);
 * }
 *
 * const label = Result.fold(
 *   (error: string) => error,
 *   (port: number) => `listening on ${port}`
 * )(parsePort('8080'));
 * // => 'listening on 8080'
 * ```
 */

/**
 * Either a successful operation carrying `data` or a failed one carrying `error`.
 *
 * @template T - The type of the success value
 * @template E - The type of the error value (defaults to string)
 */
export type Result<T, E = string> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: E };

/**
 * Constructors and curried combinators for {@link Result}.
 */
export const Result = {
  /**
   * Wraps a success value.
   *
   * @example
   * Result.ok(42); // => { success: true, data: 42 }
   */
  ok: <T, E = never>(data: T): Result<T, E> => ({ success: true, data }),

  /**
   * Wraps an error value.
   *
   * @example
   * Result.err('boom'); // => { success: false, error: 'boom' }
   */
  err: <T = never, E = string>(error: E): Result<T, E> => ({
    success: false,
    error,
  }),

  isOk: <T, E>(
    result: Result<T, E>,
  ): result is { readonly success: true; readonly data: T } => result.success,

  isErr: <T, E>(
    result: Result<T, E>,
  ): result is { readonly success: false; readonly error: E } =>
    !result.success,

  /**
   * Transforms the success value, leaving failures untouched.
   *
   * @example
   * Result.map((n: number) => n * 2)(Result.ok(21)); // => { success: true, data: 42 }
   */
  map:
    <T, U, E>(f: (data: T) => U) =>
    (result: Result<T, E>): Result<U, E> =>
      result.success ? Result.ok(f(result.data)) : Result.err(result.error),

  /**
   * Transforms the error value, leaving successes untouched.
   */
  mapError:
    <T, E, F>(f: (error: E) => F) =>
    (result: Result<T, E>): Result<T, F> =>
      result.success ? Result.ok(result.data) : Result.err(f(result.error)),

  /**
   * Chains a Result-returning step after a success.
   *
   * @example
   * const half = (n: number): Result<number, string> =>
   *   n % 2 === 0 ? Result.ok(n / 2) : Result.err('odd');
   * Result.flatMap(half)(Result.ok(8)); // => { success: true, data: 4 }
   */
  flatMap:
    <T, U, E>(f: (data: T) => Result<U, E>) =>
    (result: Result<T, E>): Result<U, E> =>
      result.success ? f(result.data) : Result.err(result.error),

  /**
   * Collapses both variants into one value.
   */
  fold:
    <T, E, R>(onError: (error: E) => R, onSuccess: (data: T) => R) =>
    (result: Result<T, E>): R =>
      result.success ? onSuccess(result.data) : onError(result.error),

  /**
   * Extracts the success value or falls back to `defaultValue`.
   */
  getOrElse:
    <T,>(defaultValue: T) =>
    <E,>(result: Result<T, E>): T =>
      result.success ? result.data : defaultValue,
} as const;
