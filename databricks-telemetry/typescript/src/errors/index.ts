/**
 * Error types for the Databricks SQL telemetry pipeline.
 */

/**
 * Error category for classification
 */
export type ErrorCategory =
  | 'configuration'
  | 'authentication'
  | 'transport'
  | 'resource'
  | 'client'
  | 'serialization'
  | 'circuit';

/**
 * Base error class for all telemetry errors
 */
export abstract class TelemetryError extends Error {
  abstract readonly category: ErrorCategory;
  abstract readonly isRetryable: boolean;
  readonly statusCode?: number;

  constructor(message: string, options?: { statusCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = this.constructor.name;
    this.statusCode = options?.statusCode;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Configuration error - invalid or missing configuration
 */
export class ConfigurationError extends TelemetryError {
  readonly category = 'configuration' as const;
  readonly isRetryable = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

// ============================================================================
// Authentication Errors
// ============================================================================

/**
 * Authentication error - credentials could not be resolved or were rejected
 */
export class AuthenticationError extends TelemetryError {
  readonly category = 'authentication' as const;
  readonly isRetryable = false;

  constructor(message: string, options?: { statusCode?: number; cause?: unknown }) {
    super(message, options);
  }
}

/**
 * No credentials are available for the connection
 */
export class MissingCredentials extends AuthenticationError {
  readonly connectionId: string;

  constructor(connectionId: string, options?: { cause?: unknown }) {
    super(`No credentials available for connection: ${connectionId}`, options);
    this.connectionId = connectionId;
  }
}

// ============================================================================
// Transport Errors
// ============================================================================

/**
 * Transport error - the collector could not be reached or answered with a failure
 */
export abstract class TransportError extends TelemetryError {
  readonly category = 'transport' as const;
  readonly isRetryable: boolean = true;
}

export class ConnectionRefused extends TransportError {
  constructor(host: string, options?: { cause?: unknown }) {
    super(`Connection refused: ${host}`, options);
  }
}

export class RequestTimeout extends TransportError {
  constructor(message: string = 'Telemetry request timed out', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class UnknownHost extends TransportError {
  constructor(host: string, options?: { cause?: unknown }) {
    super(`Unknown host: ${host}`, options);
  }
}

export class NoRouteToHost extends TransportError {
  constructor(host: string, options?: { cause?: unknown }) {
    super(`No route to host: ${host}`, options);
  }
}

/**
 * Collector answered with an HTTP error status
 */
export class HttpResponseError extends TransportError {
  override readonly isRetryable: boolean;

  constructor(statusCode: number, message?: string, options?: { cause?: unknown }) {
    super(message ?? `HTTP ${statusCode}`, { ...options, statusCode });
    this.isRetryable = statusCode === 429 || statusCode >= 500;
  }
}

/**
 * Databricks-specific HTTP failure (error payload returned by the workspace)
 */
export class DatabricksHttpError extends TransportError {
  readonly errorCode?: string;

  constructor(
    message: string,
    options?: { statusCode?: number; errorCode?: string; cause?: unknown }
  ) {
    super(message, options);
    this.errorCode = options?.errorCode;
  }
}

// ============================================================================
// Resource Errors
// ============================================================================

/**
 * Local resources (sockets, memory, worker capacity) are exhausted
 */
export class ResourceExhausted extends TelemetryError {
  readonly category = 'resource' as const;
  readonly isRetryable = true;

  constructor(message: string = 'Resources exhausted', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Work submitted to a worker pool that has been shut down
 */
export class WorkerPoolClosed extends ResourceExhausted {
  constructor() {
    super('Worker pool has been shut down');
  }
}

// ============================================================================
// Client Errors
// ============================================================================

/**
 * Caller or programmer error
 */
export class InvalidArgument extends TelemetryError {
  readonly category = 'client' as const;
  readonly isRetryable = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * A single telemetry event could not be serialized
 */
export class SerializationError extends TelemetryError {
  readonly category = 'serialization' as const;
  readonly isRetryable = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

// ============================================================================
// Circuit Errors
// ============================================================================

/**
 * Thrown when a circuit breaker does not permit the call
 */
export class CircuitOpenError extends TelemetryError {
  readonly category = 'circuit' as const;
  readonly isRetryable = false;
  readonly breakerName: string;

  constructor(breakerName: string) {
    super(`Circuit breaker '${breakerName}' does not permit further calls`);
    this.breakerName = breakerName;
  }
}

// ============================================================================
// Utilities
// ============================================================================

const CONNECTION_REFUSED_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'EPIPE', 'UND_ERR_SOCKET']);
const TIMEOUT_CODES = new Set([
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);
const UNKNOWN_HOST_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN']);
const NO_ROUTE_CODES = new Set(['EHOSTUNREACH', 'ENETUNREACH', 'EHOSTDOWN']);
const RESOURCE_CODES = new Set(['EMFILE', 'ENFILE', 'ENOMEM', 'ENOBUFS']);

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  const code = error.code;
  return typeof code === 'string' ? code : undefined;
}

/**
 * Map a Node.js or undici socket error onto the transport error hierarchy.
 * Errors that are already TelemetryErrors, or carry no known code, are returned as-is.
 */
export function fromNodeError(error: unknown, host: string): unknown {
  if (error instanceof TelemetryError) {
    return error;
  }

  const code = errorCode(error);
  if (code === undefined) {
    return error;
  }

  if (CONNECTION_REFUSED_CODES.has(code)) return new ConnectionRefused(host, { cause: error });
  if (TIMEOUT_CODES.has(code)) return new RequestTimeout(`Request to ${host} timed out`, { cause: error });
  if (UNKNOWN_HOST_CODES.has(code)) return new UnknownHost(host, { cause: error });
  if (NO_ROUTE_CODES.has(code)) return new NoRouteToHost(host, { cause: error });
  if (RESOURCE_CODES.has(code)) return new ResourceExhausted(`${code} while contacting ${host}`, { cause: error });

  return error;
}

/**
 * Check whether an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof TelemetryError) {
    return error.isRetryable;
  }
  return false;
}

/**
 * Render any thrown value as a log-friendly message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
