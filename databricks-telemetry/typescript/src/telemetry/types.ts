/**
 * Telemetry pipeline types
 */

import type { AuthProvider } from '../auth/index.js';
import type { ConnectionContext } from '../config/index.js';

export type TelemetryEventKind = 'error' | 'latency' | 'usage' | 'connection';

/**
 * One occurrence reported by the driver. Owned by a client's queue until drained.
 */
export interface TelemetryEvent {
  readonly eventId: string;
  readonly kind: TelemetryEventKind;
  readonly timestampMillis: number;
  readonly connectionId?: string;
  readonly payload: Readonly<Record<string, unknown>>;
}

/**
 * Batch sent to the collector
 */
export interface TelemetryRequest {
  readonly uploadTimeMillis: number;
  /** Serialized events, in queue order */
  readonly protoLogs: readonly string[];
}

/**
 * Capability shared by the real client, its circuit breaker decorator and the no-op client
 */
export interface TelemetryClient {
  /**
   * Hand an event to the pipeline. Never blocks on I/O and never throws.
   */
  exportEvent(event: TelemetryEvent): void;

  /**
   * Flush what is queued and release resources
   */
  close(): Promise<void>;
}

/**
 * Transport that delivers a batch to the collector
 */
export interface TelemetryPushClient {
  pushEvent(request: TelemetryRequest): Promise<void>;
}

/**
 * Where a batch goes: a connection, and its credentials when it has any
 */
export interface PushTarget {
  readonly context: ConnectionContext;
  /** null selects the unauthenticated endpoint */
  readonly authProvider: AuthProvider | null;
}

export type PushClientFactory = (target: PushTarget) => TelemetryPushClient;
