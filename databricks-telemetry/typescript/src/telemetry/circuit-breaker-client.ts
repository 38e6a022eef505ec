/**
 * Circuit breaker decorator for telemetry clients
 */

import { createDefaultCircuitBreakerConfig } from '../config/index.js';
import { errorMessage } from '../errors/index.js';
import { noopLogger, type Logger } from '../observability/logging.js';
import { CircuitBreaker } from '../resilience/circuit-breaker.js';
import type {
  CircuitBreakerConfig,
  CircuitBreakerMetrics,
  CircuitState,
  FailureClassifier,
} from '../resilience/types.js';
import type { TelemetryClient, TelemetryEvent } from './types.js';

export interface CircuitBreakerTelemetryClientOptions {
  /** Breaker name used in logs (default: 'telemetry-client') */
  name?: string;
  classifier?: FailureClassifier;
  logger?: Logger;
}

/**
 * Stops calling the delegate while it keeps failing. exportEvent never throws:
 * rejected calls and delegate errors are logged and the event is dropped.
 */
export class CircuitBreakerTelemetryClient implements TelemetryClient {
  private readonly delegate: TelemetryClient;
  private readonly breaker: CircuitBreaker;
  private readonly logger: Logger;

  constructor(
    delegate: TelemetryClient,
    config: CircuitBreakerConfig = createDefaultCircuitBreakerConfig(),
    options: CircuitBreakerTelemetryClientOptions = {}
  ) {
    this.delegate = delegate;
    this.logger = options.logger ?? noopLogger;
    this.breaker = new CircuitBreaker(options.name ?? 'telemetry-client', config, {
      classifier: options.classifier,
      logger: this.logger,
    });

    this.breaker.addHook({
      onStateChange: (from, to) => {
        this.logger.info('Telemetry circuit breaker state changed', {
          breaker: this.breaker.name,
          from,
          to,
        });
        if (to === 'open') {
          this.logger.warn('Telemetry circuit breaker is OPEN - telemetry events are being dropped', {
            breaker: this.breaker.name,
          });
        }
      },
    });
  }

  exportEvent(event: TelemetryEvent): void {
    try {
      const outcome = this.breaker.attempt(() => this.delegate.exportEvent(event));
      if (outcome.status === 'rejected') {
        this.logger.debug('Circuit breaker rejected telemetry export', {
          breaker: this.breaker.name,
          eventId: event.eventId,
        });
      }
    } catch (error) {
      this.logger.debug('Circuit breaker prevented telemetry export due to error', {
        breaker: this.breaker.name,
        error: errorMessage(error),
      });
    }
  }

  /**
   * Close the delegate. A delegate failure propagates to the caller; the breaker
   * is released either way.
   */
  async close(): Promise<void> {
    try {
      await this.delegate.close();
    } finally {
      this.breaker.releasePermission();
      this.breaker.removeAllHooks();
    }
  }

  getCircuitBreakerState(): CircuitState {
    return this.breaker.currentState();
  }

  getCircuitBreakerMetrics(): CircuitBreakerMetrics {
    return this.breaker.metrics();
  }
}
