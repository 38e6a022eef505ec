/**
 * Telemetry export for the Databricks SQL driver.
 *
 * Driver code hands events to a per-connection client obtained from
 * {@link TelemetryClientFactory}. Events are batched, serialized and pushed to the
 * workspace's collector on a bounded worker pool, behind circuit breakers, and
 * nothing in this package throws into the caller's query path.
 *
 * @example
 * ```typescript
 * import { TelemetryClientFactory, createTelemetryEvent } from 'databricks-sql-telemetry';
 *
 * const factory = TelemetryClientFactory.getInstance();
 * const context = {
 *   connectionId: 'conn-1',
 *   hostUrl: 'https://example.cloud.databricks.com',
 *   properties: { PWD: 'test-token' },
 * };
 *
 * factory.getClient(context).exportEvent(
 *   createTelemetryEvent('latency', { operation: 'executeStatement', latencyMs: 42 })
 * );
 *
 * await factory.closeClient(context);
 * ```
 */

// Configuration
export type { ConnectionContext, TelemetrySettings } from './config/index.js';
export {
  TELEMETRY_PROPERTIES,
  DEFAULTS,
  getProperty,
  isTelemetryAllowed,
  createCircuitBreakerConfig,
  createDefaultCircuitBreakerConfig,
  validateCircuitBreakerConfig,
  resolveTelemetrySettings,
} from './config/index.js';

// Errors
export * from './errors/index.js';

// Authentication
export type { AuthProvider, AuthResolver } from './auth/index.js';
export { SecretString, StaticTokenAuthProvider, resolveAuthProvider } from './auth/index.js';

// Observability
export * from './observability/index.js';

// Resilience
export * from './resilience/index.js';

// Telemetry
export * from './telemetry/index.js';
