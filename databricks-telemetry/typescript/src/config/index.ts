/**
 * Configuration for the telemetry pipeline.
 *
 * Telemetry settings are read from the driver's raw connection properties. Every
 * property is optional: an unset or unparsable value falls back to its default so
 * that a bad telemetry setting can never fail connection setup.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import type { CircuitBreakerConfig } from '../resilience/types.js';

/**
 * Connection state the telemetry pipeline needs from the driver
 */
export interface ConnectionContext {
  /** Unique id of the driver connection (one telemetry client per id) */
  readonly connectionId: string;
  /** Workspace URL the connection talks to, e.g. https://example.cloud.databricks.com */
  readonly hostUrl: string;
  /** Raw connection properties; keys are matched case-insensitively */
  readonly properties: Readonly<Record<string, string | undefined>>;
}

/**
 * Connection property names understood by the pipeline
 */
export const TELEMETRY_PROPERTIES = {
  ENABLE_TELEMETRY: 'EnableTelemetry',
  BATCH_SIZE: 'TelemetryBatchSize',
  FLUSH_INTERVAL_MS: 'TelemetryFlushInterval',
  CIRCUIT_BREAKER_ENABLED: 'telemetry.circuit.breaker.enabled',
  CIRCUIT_BREAKER_FAILURE_RATE: 'telemetry.circuit.breaker.failure.rate',
  CIRCUIT_BREAKER_MIN_CALLS: 'telemetry.circuit.breaker.min.calls',
  CIRCUIT_BREAKER_WINDOW_SIZE: 'telemetry.circuit.breaker.window.size',
  CIRCUIT_BREAKER_WAIT_DURATION: 'telemetry.circuit.breaker.wait.duration',
  CIRCUIT_BREAKER_HALF_OPEN_CALLS: 'telemetry.circuit.breaker.half.open.calls',
} as const;

/**
 * Configuration constants
 */
export const DEFAULTS = {
  /** Telemetry is on unless the connection opts out */
  TELEMETRY_ENABLED: true,
  /** Events queued before a flush is triggered */
  BATCH_SIZE: 200,
  /** Periodic flush interval in milliseconds */
  FLUSH_INTERVAL_MS: 5000,
  /** Concurrent push tasks across all connections */
  WORKER_POOL_SIZE: 10,
  CIRCUIT_BREAKER_ENABLED: true,
  /** Percentage of failed calls that opens the circuit */
  CIRCUIT_BREAKER_FAILURE_RATE: 50,
  CIRCUIT_BREAKER_MIN_CALLS: 10,
  CIRCUIT_BREAKER_WINDOW_SIZE: 20,
  /** Seconds the circuit stays open before probing */
  CIRCUIT_BREAKER_WAIT_DURATION_SECS: 60,
  CIRCUIT_BREAKER_HALF_OPEN_CALLS: 5,
} as const;

/**
 * Resolved telemetry settings for one connection
 */
export interface TelemetrySettings {
  readonly telemetryEnabled: boolean;
  readonly batchSize: number;
  readonly flushIntervalMs: number;
  /** null when the circuit breaker is disabled for the connection */
  readonly circuitBreaker: CircuitBreakerConfig | null;
}

// ============================================================================
// Property schemas
// ============================================================================

type PropertySchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

function booleanProperty(fallback: boolean): PropertySchema<boolean> {
  return z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['true', 'false', '1', '0']))
    .transform((value) => value === 'true' || value === '1')
    .catch(fallback);
}

function positiveIntProperty(fallback: number): PropertySchema<number> {
  return z
    .string()
    .trim()
    .min(1)
    .pipe(z.coerce.number().int().positive())
    .catch(fallback);
}

function percentageProperty(fallback: number): PropertySchema<number> {
  return z
    .string()
    .trim()
    .min(1)
    .pipe(z.coerce.number().gt(0).lte(100))
    .catch(fallback);
}

/**
 * Structural constraints on a circuit breaker configuration
 */
export const circuitBreakerConfigSchema = z.object({
  failureRateThreshold: z.number().gt(0).lte(100),
  minimumNumberOfCalls: z.number().int().positive(),
  slidingWindowSize: z.number().int().positive(),
  waitDurationInOpenStateMs: z.number().int().nonnegative(),
  permittedNumberOfCallsInHalfOpenState: z.number().int().positive(),
});

// ============================================================================
// Resolution
// ============================================================================

/**
 * Look up a property by name, ignoring case
 */
export function getProperty(context: ConnectionContext, key: string): string | undefined {
  const direct = context.properties[key];
  if (direct !== undefined) {
    return direct;
  }
  const wanted = key.toLowerCase();
  for (const [name, value] of Object.entries(context.properties)) {
    if (name.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}

function readProperty<T>(context: ConnectionContext, key: string, schema: PropertySchema<T>): T {
  return schema.parse(getProperty(context, key));
}

/**
 * Whether the connection allows telemetry at all
 */
export function isTelemetryAllowed(context: ConnectionContext): boolean {
  return readProperty(
    context,
    TELEMETRY_PROPERTIES.ENABLE_TELEMETRY,
    booleanProperty(DEFAULTS.TELEMETRY_ENABLED)
  );
}

/**
 * Creates a circuit breaker configuration from connection properties.
 *
 * @returns the configuration, or null when the breaker is disabled for the connection
 */
export function createCircuitBreakerConfig(context: ConnectionContext): CircuitBreakerConfig | null {
  const enabled = readProperty(
    context,
    TELEMETRY_PROPERTIES.CIRCUIT_BREAKER_ENABLED,
    booleanProperty(DEFAULTS.CIRCUIT_BREAKER_ENABLED)
  );
  if (!enabled) {
    return null;
  }

  const waitSecs = readProperty(
    context,
    TELEMETRY_PROPERTIES.CIRCUIT_BREAKER_WAIT_DURATION,
    positiveIntProperty(DEFAULTS.CIRCUIT_BREAKER_WAIT_DURATION_SECS)
  );

  return Object.freeze({
    failureRateThreshold: readProperty(
      context,
      TELEMETRY_PROPERTIES.CIRCUIT_BREAKER_FAILURE_RATE,
      percentageProperty(DEFAULTS.CIRCUIT_BREAKER_FAILURE_RATE)
    ),
    minimumNumberOfCalls: readProperty(
      context,
      TELEMETRY_PROPERTIES.CIRCUIT_BREAKER_MIN_CALLS,
      positiveIntProperty(DEFAULTS.CIRCUIT_BREAKER_MIN_CALLS)
    ),
    slidingWindowSize: readProperty(
      context,
      TELEMETRY_PROPERTIES.CIRCUIT_BREAKER_WINDOW_SIZE,
      positiveIntProperty(DEFAULTS.CIRCUIT_BREAKER_WINDOW_SIZE)
    ),
    waitDurationInOpenStateMs: waitSecs * 1000,
    permittedNumberOfCallsInHalfOpenState: readProperty(
      context,
      TELEMETRY_PROPERTIES.CIRCUIT_BREAKER_HALF_OPEN_CALLS,
      positiveIntProperty(DEFAULTS.CIRCUIT_BREAKER_HALF_OPEN_CALLS)
    ),
  });
}

/**
 * Create a circuit breaker configuration from the documented defaults
 */
export function createDefaultCircuitBreakerConfig(): CircuitBreakerConfig {
  return Object.freeze({
    failureRateThreshold: DEFAULTS.CIRCUIT_BREAKER_FAILURE_RATE,
    minimumNumberOfCalls: DEFAULTS.CIRCUIT_BREAKER_MIN_CALLS,
    slidingWindowSize: DEFAULTS.CIRCUIT_BREAKER_WINDOW_SIZE,
    waitDurationInOpenStateMs: DEFAULTS.CIRCUIT_BREAKER_WAIT_DURATION_SECS * 1000,
    permittedNumberOfCallsInHalfOpenState: DEFAULTS.CIRCUIT_BREAKER_HALF_OPEN_CALLS,
  });
}

/**
 * Validate a circuit breaker configuration built in code
 *
 * @throws ConfigurationError listing every violated constraint
 */
export function validateCircuitBreakerConfig(config: CircuitBreakerConfig): CircuitBreakerConfig {
  const result = circuitBreakerConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid circuit breaker configuration: ${issues}`, {
      cause: result.error,
    });
  }
  return config;
}

/**
 * Resolve every telemetry setting for a connection
 */
export function resolveTelemetrySettings(context: ConnectionContext): TelemetrySettings {
  return Object.freeze({
    telemetryEnabled: isTelemetryAllowed(context),
    batchSize: readProperty(
      context,
      TELEMETRY_PROPERTIES.BATCH_SIZE,
      positiveIntProperty(DEFAULTS.BATCH_SIZE)
    ),
    flushIntervalMs: readProperty(
      context,
      TELEMETRY_PROPERTIES.FLUSH_INTERVAL_MS,
      positiveIntProperty(DEFAULTS.FLUSH_INTERVAL_MS)
    ),
    circuitBreaker: createCircuitBreakerConfig(context),
  });
}
