/**
 * Failure classification for the circuit breaker
 */

import {
  ConnectionRefused,
  DatabricksHttpError,
  HttpResponseError,
  InvalidArgument,
  NoRouteToHost,
  RequestTimeout,
  ResourceExhausted,
  UnknownHost,
} from '../errors/index.js';
import type { FailureClassifier, FailureKind } from './types.js';

export type ErrorMatcher = (error: unknown) => boolean;

type ErrorClass = abstract new (...args: never[]) => Error;

/**
 * Build a matcher accepting instances of any of the given error classes
 */
export function instanceOfAny(...classes: ErrorClass[]): ErrorMatcher {
  return (error) => classes.some((errorClass) => error instanceof errorClass);
}

export interface ErrorClassifierOptions {
  /** Errors counted as failures */
  recordErrors?: ErrorMatcher[];
  /** Errors counted as neither success nor failure; checked before recordErrors */
  ignoreErrors?: ErrorMatcher[];
  /** Kind given to errors matching neither list (default: 'failure') */
  otherwise?: FailureKind;
}

/**
 * Classifies errors into failures and ignored errors.
 *
 * An error matching neither list still escaped the protected operation and is
 * counted as a failure unless `otherwise` says differently.
 */
export class ErrorClassifier implements FailureClassifier {
  private readonly recordErrors: readonly ErrorMatcher[];
  private readonly ignoreErrors: readonly ErrorMatcher[];
  private readonly otherwise: FailureKind;

  constructor(options: ErrorClassifierOptions = {}) {
    this.recordErrors = options.recordErrors ?? [];
    this.ignoreErrors = options.ignoreErrors ?? [];
    this.otherwise = options.otherwise ?? 'failure';
  }

  classify(error: unknown): FailureKind {
    if (this.ignoreErrors.some((matches) => matches(error))) {
      return 'ignored';
    }
    if (this.recordErrors.some((matches) => matches(error))) {
      return 'failure';
    }
    return this.otherwise;
  }
}

/**
 * Classifier used for telemetry delivery.
 *
 * Collector unavailability, timeouts, resource exhaustion and server errors count
 * against the breaker. Caller errors (invalid arguments, TypeErrors from null
 * references) do not.
 */
export function createTelemetryFailureClassifier(): FailureClassifier {
  return new ErrorClassifier({
    recordErrors: [
      instanceOfAny(
        ConnectionRefused,
        RequestTimeout,
        NoRouteToHost,
        UnknownHost,
        ResourceExhausted,
        RangeError,
        HttpResponseError,
        DatabricksHttpError
      ),
    ],
    ignoreErrors: [instanceOfAny(InvalidArgument, TypeError)],
  });
}
