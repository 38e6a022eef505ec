/**
 * Telemetry export pipeline
 */

export type {
  TelemetryEvent,
  TelemetryEventKind,
  TelemetryRequest,
  TelemetryClient,
  TelemetryPushClient,
  PushTarget,
  PushClientFactory,
} from './types.js';

export type { EventSerializer } from './serializer.js';
export { createTelemetryEvent, serializeEvent } from './serializer.js';

export { WorkerPool } from './worker-pool.js';

export type {
  HttpRequester,
  HttpRequestOptions,
  HttpResponse,
  HttpTelemetryPushClientOptions,
} from './push-client.js';
export {
  HttpTelemetryPushClient,
  CircuitBreakerPushClient,
  parseErrorResponse,
  AUTHENTICATED_TELEMETRY_PATH,
  UNAUTHENTICATED_TELEMETRY_PATH,
} from './push-client.js';

export type { TelemetryPushTaskOptions } from './push-task.js';
export { TelemetryPushTask } from './push-task.js';

export type { TelemetryClientOptions } from './client.js';
export { DefaultTelemetryClient } from './client.js';

export type { CircuitBreakerTelemetryClientOptions } from './circuit-breaker-client.js';
export { CircuitBreakerTelemetryClient } from './circuit-breaker-client.js';

export { NoopTelemetryClient } from './noop-client.js';

export type { TelemetryClientFactoryOptions } from './factory.js';
export { TelemetryClientFactory } from './factory.js';

export type { FailureLogDetails } from './helper.js';
export { exportFailureLog, exportLatencyLog } from './helper.js';
