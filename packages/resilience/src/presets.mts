/**
 * Named, immutable configurations. Spread one to override a field:
 * `createRetryPolicy({ ...retryPresets.quick, name: 'cache-fill' })`.
 */

import type { CircuitBreakerConfig } from "./circuit-breaker.mjs";
import type { RetryConfig } from "./retry.mjs";

import { isTransportError } from "./transport-errors.mjs";

export const retryPresets = Object.freeze({
  default: Object.freeze<RetryConfig>({}),

  /** Two fast attempts for cheap, latency-sensitive calls */
  quick: Object.freeze<RetryConfig>({
    name: "quick-retry",
    maxAttempts: 2,
    initialDelayMs: 50,
    backoffMultiplier: 1.5,
  }),

  resilient: Object.freeze<RetryConfig>({
    name: "resilient-retry",
    maxAttempts: 5,
    initialDelayMs: 200,
    maxDelayMs: 10_000,
    backoffMultiplier: 2,
    jitterFactor: 0.2,
  }),

  /** Longer waits, and only connection-level failures are retried */
  network: Object.freeze<RetryConfig>({
    name: "network-retry",
    maxAttempts: 3,
    initialDelayMs: 1_000,
    maxDelayMs: 30_000,
    backoffMultiplier: 2,
    jitterFactor: 0.3,
    shouldRetry: isTransportError,
  }),
});

export const circuitBreakerPresets = Object.freeze({
  standard: Object.freeze<CircuitBreakerConfig>({
    failureThreshold: 5,
    successThreshold: 3,
    waitDurationInOpenStateMs: 30_000,
    callTimeoutMs: 1_000,
  }),

  /** Opens early and probes again soon, for dependencies on the hot path */
  sensitive: Object.freeze<CircuitBreakerConfig>({
    failureThreshold: 2,
    successThreshold: 1,
    waitDurationInOpenStateMs: 5_000,
    callTimeoutMs: 500,
  }),

  /** Rides out bursts of errors from slow batch-style dependencies */
  tolerant: Object.freeze<CircuitBreakerConfig>({
    failureThreshold: 10,
    successThreshold: 5,
    waitDurationInOpenStateMs: 60_000,
    callTimeoutMs: 10_000,
  }),
});
