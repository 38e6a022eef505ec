/**
 * Types shared by the resilience layer
 */

/**
 * Circuit breaker state
 */
export type CircuitState = 'closed' | 'open' | 'half_open';

/**
 * Circuit breaker tuning. Immutable once built; a missing config means "no breaker".
 */
export interface CircuitBreakerConfig {
  /** Failure rate (percent) at or above which the circuit opens */
  readonly failureRateThreshold: number;
  /** Calls that must be recorded before the failure rate is evaluated */
  readonly minimumNumberOfCalls: number;
  /** Number of most recent outcomes kept in the sliding window */
  readonly slidingWindowSize: number;
  /** How long the circuit stays open before allowing probes */
  readonly waitDurationInOpenStateMs: number;
  /** Probe calls allowed while half-open */
  readonly permittedNumberOfCallsInHalfOpenState: number;
}

/**
 * How an error escaping a protected call is counted
 */
export type FailureKind = 'failure' | 'ignored';

export interface FailureClassifier {
  classify(error: unknown): FailureKind;
}

/**
 * Hook for circuit breaker state changes
 */
export interface CircuitBreakerHook {
  onStateChange(from: CircuitState, to: CircuitState): void;
}

export interface CircuitBreakerMetrics {
  /** Calls counted as failures since creation or the last reset */
  failed: number;
  /** Calls that completed normally since creation or the last reset */
  succeeded: number;
  /** Calls refused without invoking the operation */
  rejected: number;
  /** Calls whose error was classified as ignored */
  ignored: number;
  /** Outcomes currently held in the sliding window */
  bufferedCalls: number;
  /** Failure rate of the current window in percent (0 when empty) */
  failureRate: number;
}

/**
 * Result of a synchronous attempt through the breaker
 */
export type CallOutcome<T> =
  | { status: 'success'; value: T }
  | { status: 'rejected' };
