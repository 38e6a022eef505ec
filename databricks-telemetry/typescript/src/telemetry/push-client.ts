/**
 * Telemetry transport over HTTP, and its circuit breaker decorator
 */

import { request } from 'undici';
import type { AuthProvider } from '../auth/index.js';
import {
  DatabricksHttpError,
  HttpResponseError,
  fromNodeError,
} from '../errors/index.js';
import type { CircuitBreaker } from '../resilience/circuit-breaker.js';
import type { TelemetryPushClient, TelemetryRequest } from './types.js';

export const AUTHENTICATED_TELEMETRY_PATH = '/telemetry-ext';
export const UNAUTHENTICATED_TELEMETRY_PATH = '/telemetry-unauth';

const DEFAULT_TIMEOUT_MS = 10000;

export interface HttpResponse {
  statusCode: number;
  body: { text(): Promise<string> };
}

export interface HttpRequestOptions {
  method: 'POST';
  headers: Record<string, string>;
  body: string;
  headersTimeout: number;
  bodyTimeout: number;
}

export type HttpRequester = (url: string, options: HttpRequestOptions) => Promise<HttpResponse>;

const undiciRequester: HttpRequester = (url, options) => request(url, options);

export interface HttpTelemetryPushClientOptions {
  hostUrl: string;
  /** Credentials; when null the unauthenticated endpoint is used */
  authProvider: AuthProvider | null;
  timeoutMs?: number;
  userAgent?: string;
  requester?: HttpRequester;
}

/**
 * Sends telemetry batches to the workspace's telemetry endpoint with undici
 */
export class HttpTelemetryPushClient implements TelemetryPushClient {
  private readonly url: string;
  private readonly host: string;
  private readonly authProvider: AuthProvider | null;
  private readonly timeoutMs: number;
  private readonly userAgent?: string;
  private readonly requester: HttpRequester;

  constructor(options: HttpTelemetryPushClientOptions) {
    const base = options.hostUrl.replace(/\/+$/, '');
    const path = options.authProvider ? AUTHENTICATED_TELEMETRY_PATH : UNAUTHENTICATED_TELEMETRY_PATH;
    this.url = `${base}${path}`;
    this.host = base;
    this.authProvider = options.authProvider;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = options.userAgent;
    this.requester = options.requester ?? undiciRequester;
  }

  get endpoint(): string {
    return this.url;
  }

  async pushEvent(telemetryRequest: TelemetryRequest): Promise<void> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
    if (this.userAgent) {
      headers['User-Agent'] = this.userAgent;
    }
    if (this.authProvider) {
      headers['Authorization'] = await this.authProvider.getAuthorizationHeader();
    }

    let response: HttpResponse;
    try {
      response = await this.requester(this.url, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          uploadTime: telemetryRequest.uploadTimeMillis,
          protoLogs: telemetryRequest.protoLogs,
        }),
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
      });
    } catch (error) {
      throw fromNodeError(error, this.host);
    }

    // Consume the response body to free resources
    const text = await response.body.text();

    if (response.statusCode >= 400) {
      throw parseErrorResponse(response.statusCode, text);
    }
  }
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

/**
 * Map an error status onto the transport error hierarchy
 */
export function parseErrorResponse(statusCode: number, body: string): Error {
  if (statusCode === 429 || statusCode >= 500) {
    return new HttpResponseError(statusCode, `HTTP ${statusCode}: ${statusCode >= 500 ? 'Server Error' : 'Too Many Requests'}`);
  }

  let errorCode: string | undefined;
  let message = `HTTP ${statusCode}: Client Error`;
  const parsed = parseJson(body);
  if (typeof parsed === 'object' && parsed !== null) {
    if ('error_code' in parsed && typeof parsed.error_code === 'string') {
      errorCode = parsed.error_code;
    }
    if ('message' in parsed && typeof parsed.message === 'string') {
      message = parsed.message;
    }
  }

  return new DatabricksHttpError(message, { statusCode, errorCode });
}

/**
 * Routes pushes through a circuit breaker shared by every connection to the same host
 */
export class CircuitBreakerPushClient implements TelemetryPushClient {
  private readonly delegate: TelemetryPushClient;
  private readonly breaker: CircuitBreaker;

  constructor(delegate: TelemetryPushClient, breaker: CircuitBreaker) {
    this.delegate = delegate;
    this.breaker = breaker;
  }

  pushEvent(telemetryRequest: TelemetryRequest): Promise<void> {
    return this.breaker.execute(() => this.delegate.pushEvent(telemetryRequest));
  }
}
