import { describe, expect, it } from 'vitest';
import {
  TELEMETRY_PROPERTIES,
  createCircuitBreakerConfig,
  createDefaultCircuitBreakerConfig,
  getProperty,
  isTelemetryAllowed,
  resolveTelemetrySettings,
  validateCircuitBreakerConfig,
  type ConnectionContext,
} from '../index.js';
import { ConfigurationError } from '../../errors/index.js';

function contextWith(properties: Record<string, string | undefined>): ConnectionContext {
  return {
    connectionId: 'conn-1',
    hostUrl: 'https://example.cloud.databricks.com',
    properties,
  };
}

describe('createCircuitBreakerConfig', () => {
  it('uses the documented defaults when nothing is set', () => {
    expect(createCircuitBreakerConfig(contextWith({}))).toEqual({
      failureRateThreshold: 50,
      minimumNumberOfCalls: 10,
      slidingWindowSize: 20,
      waitDurationInOpenStateMs: 60_000,
      permittedNumberOfCallsInHalfOpenState: 5,
    });
  });

  it('returns an immutable config', () => {
    const config = createCircuitBreakerConfig(contextWith({}));

    expect(Object.isFrozen(config)).toBe(true);
  });

  it.each(['false', 'FALSE', ' False ', '0'])('returns null when disabled with %j', (value) => {
    const context = contextWith({ [TELEMETRY_PROPERTIES.CIRCUIT_BREAKER_ENABLED]: value });

    expect(createCircuitBreakerConfig(context)).toBeNull();
  });

  it('keeps the breaker enabled for an unrecognised flag', () => {
    const context = contextWith({ [TELEMETRY_PROPERTIES.CIRCUIT_BREAKER_ENABLED]: 'maybe' });

    expect(createCircuitBreakerConfig(context)).not.toBeNull();
  });

  it('reads every tuning property', () => {
    const context = contextWith({
      [TELEMETRY_PROPERTIES.CIRCUIT_BREAKER_ENABLED]: 'true',
      [TELEMETRY_PROPERTIES.CIRCUIT_BREAKER_FAILURE_RATE]: '75.5',
      [TELEMETRY_PROPERTIES.CIRCUIT_BREAKER_MIN_CALLS]: '3',
      [TELEMETRY_PROPERTIES.CIRCUIT_BREAKER_WINDOW_SIZE]: '8',
      [TELEMETRY_PROPERTIES.CIRCUIT_BREAKER_WAIT_DURATION]: ' 30 ',
      [TELEMETRY_PROPERTIES.CIRCUIT_BREAKER_HALF_OPEN_CALLS]: '2',
    });

    expect(createCircuitBreakerConfig(context)).toEqual({
      failureRateThreshold: 75.5,
      minimumNumberOfCalls: 3,
      slidingWindowSize: 8,
      waitDurationInOpenStateMs: 30_000,
      permittedNumberOfCallsInHalfOpenState: 2,
    });
  });

  it('falls back to defaults for unparsable or out-of-range values', () => {
    const context = contextWith({
      [TELEMETRY_PROPERTIES.CIRCUIT_BREAKER_FAILURE_RATE]: '150',
      [TELEMETRY_PROPERTIES.CIRCUIT_BREAKER_MIN_CALLS]: 'abc',
      [TELEMETRY_PROPERTIES.CIRCUIT_BREAKER_WINDOW_SIZE]: '-1',
      [TELEMETRY_PROPERTIES.CIRCUIT_BREAKER_WAIT_DURATION]: '1.5',
      [TELEMETRY_PROPERTIES.CIRCUIT_BREAKER_HALF_OPEN_CALLS]: '',
    });

    expect(createCircuitBreakerConfig(context)).toEqual(createDefaultCircuitBreakerConfig());
  });
});

describe('getProperty', () => {
  it('matches keys case-insensitively', () => {
    const context = contextWith({ enabletelemetry: '0' });

    expect(getProperty(context, TELEMETRY_PROPERTIES.ENABLE_TELEMETRY)).toBe('0');
    expect(isTelemetryAllowed(context)).toBe(false);
  });

  it('returns undefined for missing keys', () => {
    expect(getProperty(contextWith({}), 'PWD')).toBeUndefined();
  });
});

describe('resolveTelemetrySettings', () => {
  it('resolves defaults', () => {
    expect(resolveTelemetrySettings(contextWith({}))).toEqual({
      telemetryEnabled: true,
      batchSize: 200,
      flushIntervalMs: 5000,
      circuitBreaker: createDefaultCircuitBreakerConfig(),
    });
  });

  it('reads batching properties', () => {
    const settings = resolveTelemetrySettings(
      contextWith({
        [TELEMETRY_PROPERTIES.ENABLE_TELEMETRY]: 'false',
        [TELEMETRY_PROPERTIES.BATCH_SIZE]: '50',
        [TELEMETRY_PROPERTIES.FLUSH_INTERVAL_MS]: '1000',
        [TELEMETRY_PROPERTIES.CIRCUIT_BREAKER_ENABLED]: 'false',
      })
    );

    expect(settings).toEqual({
      telemetryEnabled: false,
      batchSize: 50,
      flushIntervalMs: 1000,
      circuitBreaker: null,
    });
  });
});

describe('validateCircuitBreakerConfig', () => {
  it('accepts the defaults', () => {
    const config = createDefaultCircuitBreakerConfig();

    expect(validateCircuitBreakerConfig(config)).toBe(config);
  });

  it('names every violated field', () => {
    const invalid = {
      ...createDefaultCircuitBreakerConfig(),
      failureRateThreshold: 0,
      permittedNumberOfCallsInHalfOpenState: 1.5,
    };

    expect(() => validateCircuitBreakerConfig(invalid)).toThrow(ConfigurationError);
    expect(() => validateCircuitBreakerConfig(invalid)).toThrow(/failureRateThreshold/);
    expect(() => validateCircuitBreakerConfig(invalid)).toThrow(
      /permittedNumberOfCallsInHalfOpenState/
    );
  });
});
