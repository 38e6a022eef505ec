/**
 * Named circuit breakers shared between components
 */

import { noopLogger, type Logger } from '../observability/logging.js';
import { CircuitBreaker } from './circuit-breaker.js';
import type { CircuitBreakerConfig, FailureClassifier } from './types.js';

export interface CircuitBreakerRegistryOptions {
  classifier?: FailureClassifier;
  logger?: Logger;
}

/**
 * Holds one breaker per name. The first caller's configuration wins; later
 * callers asking for the same name share that breaker.
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly options: CircuitBreakerRegistryOptions;
  private readonly logger: Logger;

  constructor(options: CircuitBreakerRegistryOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? noopLogger;
  }

  getOrCreate(name: string, config: CircuitBreakerConfig): CircuitBreaker {
    let breaker = this.breakers.get(name);
    if (!breaker) {
      breaker = new CircuitBreaker(name, config, {
        classifier: this.options.classifier,
        logger: this.logger,
      });
      breaker.addHook({
        onStateChange: (from, to) => {
          this.logger.info('Telemetry circuit breaker state changed', { breaker: name, from, to });
        },
      });
      this.breakers.set(name, breaker);
    }
    return breaker;
  }

  get(name: string): CircuitBreaker | undefined {
    return this.breakers.get(name);
  }

  remove(name: string): boolean {
    const breaker = this.breakers.get(name);
    breaker?.removeAllHooks();
    return this.breakers.delete(name);
  }

  clear(): void {
    for (const breaker of this.breakers.values()) {
      breaker.removeAllHooks();
    }
    this.breakers.clear();
  }

  get size(): number {
    return this.breakers.size;
  }
}
