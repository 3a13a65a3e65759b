/**
 * @bulwark/resilience
 *
 * Circuit breaker and retry policy that return a Result instead of throwing,
 * and compose: a retry policy can send each attempt through a breaker.
 */

// ============================================================================
// Types & Errors
// ============================================================================

export type {
  CircuitState,
  CircuitBreakerError,
  CircuitOpenError,
  CircuitTimeoutError,
  CircuitExecutionError,
  RetryExhaustedError,
  RetryExhaustedReason,
  RetryInterruptedError,
  RetryFailure,
  ErrorMapper,
  ResilienceError,
} from "./types.mjs";

export {
  isCircuitBreakerError,
  isCircuitOpenError,
  isRetryExhaustedError,
  isRetryInterruptedError,
  createCircuitOpenError,
  createCircuitTimeoutError,
  createCircuitExecutionError,
  createRetryExhaustedError,
  createRetryInterruptedError,
} from "./types.mjs";

// ============================================================================
// Circuit Breaker
// ============================================================================

export {
  CircuitBreaker,
  createCircuitBreaker,
  resolveCircuitBreakerConfig,
  type CircuitBreakerConfig,
  type CircuitBreakerMetrics,
  type CircuitStateListener,
  type ResolvedCircuitBreakerConfig,
} from "./circuit-breaker.mjs";

export { CircuitBreakerRegistry } from "./registry.mjs";

// ============================================================================
// Retry
// ============================================================================

export {
  RetryPolicy,
  createRetryPolicy,
  resolveRetryConfig,
  type RetryConfig,
  type ResolvedRetryConfig,
  type RetryPredicate,
  type RetryOperation,
  type RetryAttemptContext,
  type RetryExecuteOptions,
} from "./retry.mjs";

export {
  computeDelay,
  JitteredExponentialBackoff,
  type DelayOptions,
  type RetryBackoff,
  type RetryBackoffContext,
} from "./backoff.mjs";

// ============================================================================
// Presets & Predicates
// ============================================================================

export { retryPresets, circuitBreakerPresets } from "./presets.mjs";
export { isTransportError } from "./transport-errors.mjs";

// re-export Result from functional package
export { Result } from "@bulwark/functional";
