/**
 * Circuit breaker with a count-based sliding window
 */

import { validateCircuitBreakerConfig } from '../config/index.js';
import { CircuitOpenError, errorMessage } from '../errors/index.js';
import { noopLogger, type Logger } from '../observability/logging.js';
import { createTelemetryFailureClassifier } from './classifier.js';
import type {
  CallOutcome,
  CircuitBreakerConfig,
  CircuitBreakerHook,
  CircuitBreakerMetrics,
  CircuitState,
  FailureClassifier,
} from './types.js';

export interface CircuitBreakerOptions {
  classifier?: FailureClassifier;
  logger?: Logger;
}

/**
 * Circuit breaker that stops calling an operation once its recent failure rate
 * crosses a threshold, and probes it again after a cool-down.
 *
 * States:
 * - Closed: every call runs; outcomes fill the sliding window. Once
 *   `minimumNumberOfCalls` outcomes are buffered, the failure rate is checked after
 *   each call and the circuit opens when it reaches the threshold.
 * - Open: calls are rejected without running. The first permission request after
 *   `waitDurationInOpenStateMs` moves the circuit to half-open.
 * - Half-Open: up to `permittedNumberOfCallsInHalfOpenState` probes run. When all
 *   of them have completed the circuit closes, or reopens if their failure rate
 *   reaches the threshold. Further calls are rejected meanwhile.
 *
 * An outcome only enters the window of the state its call was permitted in. A call
 * still running across a transition or a reset counts in metrics alone.
 */
export class CircuitBreaker {
  readonly name: string;
  private state: CircuitState = 'closed';
  private readonly config: CircuitBreakerConfig;
  private readonly classifier: FailureClassifier;
  private readonly logger: Logger;
  private hooks: CircuitBreakerHook[] = [];

  /** true marks a failed call */
  private window: boolean[] = [];
  private windowFailures = 0;
  private openedAt = 0;
  private halfOpenPermits = 0;
  /** Bumped on every transition; outcomes of calls permitted in an earlier state are not buffered */
  private epoch = 0;

  private failed = 0;
  private succeeded = 0;
  private rejected = 0;
  private ignored = 0;

  constructor(name: string, config: CircuitBreakerConfig, options: CircuitBreakerOptions = {}) {
    this.name = name;
    this.config = validateCircuitBreakerConfig(config);
    this.classifier = options.classifier ?? createTelemetryFailureClassifier();
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Add a hook to be called on state changes
   */
  addHook(hook: CircuitBreakerHook): void {
    this.hooks.push(hook);
  }

  removeAllHooks(): void {
    this.hooks = [];
  }

  /**
   * Run a synchronous operation through the breaker.
   *
   * @returns `rejected` without running the operation when the circuit does not
   * permit the call
   * @throws whatever the operation throws, after the error has been classified
   */
  attempt<T>(operation: () => T): CallOutcome<T> {
    if (!this.tryAcquirePermission()) {
      this.rejected++;
      return { status: 'rejected' };
    }

    const epoch = this.epoch;
    let value: T;
    try {
      value = operation();
    } catch (error) {
      this.onError(error, epoch);
      throw error;
    }
    this.onSuccess(epoch);
    return { status: 'success', value };
  }

  /**
   * Run an async operation through the breaker
   *
   * @throws CircuitOpenError if the circuit does not permit the call
   * @throws The original error from the operation
   */
  async execute<T>(operation: () => Promise<T>): Promise<T> {
    if (!this.tryAcquirePermission()) {
      this.rejected++;
      throw new CircuitOpenError(this.name);
    }

    const epoch = this.epoch;
    let value: T;
    try {
      value = await operation();
    } catch (error) {
      this.onError(error, epoch);
      throw error;
    }
    this.onSuccess(epoch);
    return value;
  }

  /**
   * Give back a half-open permit that was acquired but never used
   */
  releasePermission(): void {
    if (this.state === 'half_open' && this.halfOpenPermits > 0) {
      this.halfOpenPermits--;
    }
  }

  currentState(): CircuitState {
    return this.state;
  }

  metrics(): CircuitBreakerMetrics {
    return {
      failed: this.failed,
      succeeded: this.succeeded,
      rejected: this.rejected,
      ignored: this.ignored,
      bufferedCalls: this.window.length,
      failureRate: this.failureRate(),
    };
  }

  /**
   * Force the circuit closed and forget all recorded outcomes
   */
  reset(): void {
    if (this.state !== 'closed') {
      this.transitionTo('closed');
    }
    this.clearWindow();
    this.epoch++;
    this.failed = 0;
    this.succeeded = 0;
    this.rejected = 0;
    this.ignored = 0;
  }

  private tryAcquirePermission(): boolean {
    if (this.state === 'open') {
      if (Date.now() - this.openedAt < this.config.waitDurationInOpenStateMs) {
        return false;
      }
      this.transitionTo('half_open');
    }

    if (this.state === 'half_open') {
      if (this.halfOpenPermits >= this.config.permittedNumberOfCallsInHalfOpenState) {
        return false;
      }
      this.halfOpenPermits++;
    }

    return true;
  }

  private onSuccess(epoch: number): void {
    this.succeeded++;
    this.record(false, epoch);
  }

  private onError(error: unknown, epoch: number): void {
    if (this.classifier.classify(error) === 'ignored') {
      this.ignored++;
      if (epoch === this.epoch) {
        this.releasePermission();
      }
      return;
    }
    this.failed++;
    this.record(true, epoch);
  }

  private record(failure: boolean, epoch: number): void {
    // Calls permitted before the last transition only count in metrics
    if (this.state === 'open' || epoch !== this.epoch) {
      return;
    }

    this.window.push(failure);
    if (failure) {
      this.windowFailures++;
    }

    const capacity = this.state === 'half_open'
      ? this.config.permittedNumberOfCallsInHalfOpenState
      : this.config.slidingWindowSize;
    while (this.window.length > capacity) {
      if (this.window.shift()) {
        this.windowFailures--;
      }
    }

    this.evaluate();
  }

  private evaluate(): void {
    const rate = this.failureRate();

    if (this.state === 'closed') {
      const minimumCalls = Math.min(this.config.minimumNumberOfCalls, this.config.slidingWindowSize);
      if (this.window.length >= minimumCalls && rate >= this.config.failureRateThreshold) {
        this.transitionTo('open');
      }
      return;
    }

    if (this.window.length >= this.config.permittedNumberOfCallsInHalfOpenState) {
      this.transitionTo(rate >= this.config.failureRateThreshold ? 'open' : 'closed');
    }
  }

  private failureRate(): number {
    if (this.window.length === 0) {
      return 0;
    }
    return (this.windowFailures / this.window.length) * 100;
  }

  private clearWindow(): void {
    this.window = [];
    this.windowFailures = 0;
    this.halfOpenPermits = 0;
  }

  private transitionTo(newState: CircuitState): void {
    const oldState = this.state;
    this.state = newState;
    this.epoch++;
    this.clearWindow();
    if (newState === 'open') {
      this.openedAt = Date.now();
    }

    for (const hook of this.hooks) {
      try {
        hook.onStateChange(oldState, newState);
      } catch (error) {
        this.logger.debug('Circuit breaker hook failed', {
          breaker: this.name,
          error: errorMessage(error),
        });
      }
    }
  }
}
