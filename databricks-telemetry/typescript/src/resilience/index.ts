/**
 * Resilience layer: circuit breaking for telemetry delivery
 */

export type {
  CircuitState,
  CircuitBreakerConfig,
  CircuitBreakerHook,
  CircuitBreakerMetrics,
  CallOutcome,
  FailureClassifier,
  FailureKind,
} from './types.js';

export type { CircuitBreakerOptions } from './circuit-breaker.js';
export { CircuitBreaker } from './circuit-breaker.js';

export type { ErrorMatcher, ErrorClassifierOptions } from './classifier.js';
export {
  ErrorClassifier,
  instanceOfAny,
  createTelemetryFailureClassifier,
} from './classifier.js';

export type { CircuitBreakerRegistryOptions } from './registry.js';
export { CircuitBreakerRegistry } from './registry.js';
