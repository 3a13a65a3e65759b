/**
 * @module types
 * @description Circuit states and the tagged error values produced by the
 * resilience engine. Every error is an immutable plain object with a `tag`
 * discriminator, so callers narrow with a `switch` or the guards below rather
 * than with `instanceof`.
 *
 * @example
 * ```typescript
 * const result = await breaker.execute(() => fetchQuote(symbol));
 * if (!result.success && isCircuitOpenError(result.error)) {
 *   console.log('try again after', result.error.nextAttempt);
 * }
 * ```
 */

/**
 * Circuit breaker state
 */
export type CircuitState = "closed" | "open" | "half-open";

/**
 * Fields shared by every circuit breaker error
 */
interface CircuitBreakerErrorBase {
  /** Discriminator for type narrowing */
  readonly tag: "circuit-breaker";
  /** Human-readable error message */
  readonly message: string;
  /** Name of the breaker that produced the error */
  readonly breakerName: string;
}

/**
 * The call was rejected without running: the circuit is open, or every
 * half-open probe slot is taken.
 */
export interface CircuitOpenError extends CircuitBreakerErrorBase {
  readonly kind: "open";
  /** State at the moment of rejection */
  readonly state: "open" | "half-open";
  /**
   * Earliest time the breaker will admit a call: the end of the open wait
   * while open, or the rejection time while half-open, where a probe slot can
   * free up at any moment.
   */
  readonly nextAttempt: Date;
}

/**
 * The call completed but took longer than the per-call timeout. Detected after
 * the fact; the operation itself was not interrupted.
 */
export interface CircuitTimeoutError extends CircuitBreakerErrorBase {
  readonly kind: "timeout";
  readonly elapsedMs: number;
  readonly timeoutMs: number;
}

/**
 * The operation threw or rejected.
 */
export interface CircuitExecutionError extends CircuitBreakerErrorBase {
  readonly kind: "execution-failure";
  /** Whatever the operation threw */
  readonly cause: unknown;
}

export type CircuitBreakerError =
  | CircuitOpenError
  | CircuitTimeoutError
  | CircuitExecutionError;

export type RetryExhaustedReason = "attempts-exhausted" | "not-retryable";

/**
 * Retrying stopped: either every attempt failed, or the retry predicate
 * declined the last error.
 *
 * @template E - Type of the last observed error
 */
export interface RetryExhaustedError<E = unknown> {
  readonly tag: "retry-exhausted";
  readonly message: string;
  readonly policyName: string;
  /** Number of attempts actually made */
  readonly attempts: number;
  readonly lastError: E;
  readonly reason: RetryExhaustedReason;
}

/**
 * The wait between attempts was cancelled through an `AbortSignal`. The retry
 * loop ended and was not resumed.
 */
export interface RetryInterruptedError<E = unknown> {
  readonly tag: "retry-interrupted";
  readonly message: string;
  readonly policyName: string;
  /** Number of attempts made before the interruption */
  readonly attempts: number;
  /** Error of the last attempt, if one ran */
  readonly lastError?: E;
  /** The signal's abort reason */
  readonly reason: unknown;
}

/**
 * Every way a retry policy execution can fail
 */
export type RetryFailure<E = unknown> =
  | RetryExhaustedError<E>
  | RetryInterruptedError<E>;

/**
 * Converts an engine error into the caller's own error type. Runs after the
 * outcome is recorded; an exception thrown here propagates to the caller.
 */
export type ErrorMapper<E, F> = (error: E) => F;

export type ResilienceError =
  | CircuitBreakerError
  | RetryExhaustedError
  | RetryInterruptedError;

// ============================================================================
// Type Guards
// ============================================================================

function createTagTypeGuard<T extends ResilienceError>(tag: T["tag"]) {
  return (error: unknown): error is T =>
    typeof error === "object" &&
    error !== null &&
    "tag" in error &&
    error.tag === tag;
}

export const isCircuitBreakerError =
  createTagTypeGuard<CircuitBreakerError>("circuit-breaker");

export const isCircuitOpenError = (error: unknown): error is CircuitOpenError =>
  isCircuitBreakerError(error) && error.kind === "open";

export const isRetryExhaustedError =
  createTagTypeGuard<RetryExhaustedError>("retry-exhausted");

export const isRetryInterruptedError =
  createTagTypeGuard<RetryInterruptedError>("retry-interrupted");

// ============================================================================
// Error Constructors
// ============================================================================

export const createCircuitOpenError = (
  breakerName: string,
  state: "open" | "half-open",
  nextAttempt: Date,
): CircuitOpenError => ({
  tag: "circuit-breaker",
  kind: "open",
  message: `Circuit breaker is OPEN for: ${breakerName}`,
  breakerName,
  state,
  nextAttempt,
});

export const createCircuitTimeoutError = (
  breakerName: string,
  elapsedMs: number,
  timeoutMs: number,
): CircuitTimeoutError => ({
  tag: "circuit-breaker",
  kind: "timeout",
  message: `Operation timed out: ${breakerName} took ${elapsedMs}ms (limit ${timeoutMs}ms)`,
  breakerName,
  elapsedMs,
  timeoutMs,
});

export const createCircuitExecutionError = (
  breakerName: string,
  cause: unknown,
): CircuitExecutionError => ({
  tag: "circuit-breaker",
  kind: "execution-failure",
  message: `Operation failed: ${breakerName}`,
  breakerName,
  cause,
});

export const createRetryExhaustedError = <E,>(
  policyName: string,
  attempts: number,
  lastError: E,
  reason: RetryExhaustedReason,
): RetryExhaustedError<E> => ({
  tag: "retry-exhausted",
  message:
    reason === "attempts-exhausted"
      ? `Operation ${policyName} failed after ${attempts} attempts`
      : `Operation ${policyName} failed with a non-retryable error on attempt ${attempts}`,
  policyName,
  attempts,
  lastError,
  reason,
});

export const createRetryInterruptedError = <E,>(
  policyName: string,
  attempts: number,
  lastError: E | undefined,
  reason: unknown,
): RetryInterruptedError<E> => ({
  tag: "retry-interrupted",
  message: `Retry interrupted: ${policyName} after ${attempts} attempts`,
  policyName,
  attempts,
  lastError,
  reason,
});
