import type { CircuitBreakerConfig, CircuitBreakerMetrics } from "./circuit-breaker.mjs";

import { CircuitBreaker } from "./circuit-breaker.mjs";

/**
 * Process-lifetime home for breakers keyed by operation name, so every caller
 * of the same operation shares one breaker.
 *
 * @example
 * ```typescript
 * const breakers = new CircuitBreakerRegistry({ failureThreshold: 3 });
 * const result = await breakers.getOrCreate('ledger-api').execute(() => ledger.post(entry));
 * ```
 */
export class CircuitBreakerRegistry {
  private breakers = new Map<string, CircuitBreaker>();

  /**
   * @param defaults - Config applied under any per-breaker config
   */
  constructor(private readonly defaults: CircuitBreakerConfig = {}) {}

  /**
   * Returns the breaker registered under `name`, creating it on first use.
   * `config` only applies to that first creation.
   */
  getOrCreate(name: string, config: CircuitBreakerConfig = {}): CircuitBreaker {
    let breaker = this.breakers.get(name);
    if (!breaker) {
      breaker = new CircuitBreaker({ ...this.defaults, ...config, name });
      this.breakers.set(name, breaker);
    }
    return breaker;
  }

  get(name: string): CircuitBreaker | undefined {
    return this.breakers.get(name);
  }

  has(name: string): boolean {
    return this.breakers.has(name);
  }

  reset(name: string): void {
    this.breakers.get(name)?.reset();
  }

  resetAll(): void {
    for (const breaker of this.breakers.values()) {
      breaker.reset();
    }
  }

  metrics(): CircuitBreakerMetrics[] {
    return Array.from(this.breakers.values(), (breaker) => breaker.getMetrics());
  }

  clear(): void {
    this.breakers.clear();
  }
}
