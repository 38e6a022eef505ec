/**
 * Reporting helpers for driver code: turn failures and timings into telemetry events
 */

import type { ConnectionContext } from '../config/index.js';
import type { TelemetryClientFactory } from './factory.js';
import { createTelemetryEvent } from './serializer.js';

export interface FailureLogDetails {
  statementId?: string;
  /** Result chunk whose download failed */
  chunkIndex?: number;
  /** Skip reporting, for errors the driver raises on purpose */
  silent?: boolean;
}

/**
 * Report a driver error for the connection it happened on.
 * Does nothing without a connection context.
 */
export function exportFailureLog(
  factory: TelemetryClientFactory,
  context: ConnectionContext | undefined,
  errorName: string,
  errorMessage: string,
  details: FailureLogDetails = {}
): void {
  if (!context || details.silent) {
    return;
  }

  const event = createTelemetryEvent(
    'error',
    {
      errorName,
      errorMessage,
      statementId: details.statementId,
      chunkIndex: details.chunkIndex,
    },
    { connectionId: context.connectionId }
  );
  factory.getClient(context).exportEvent(event);
}

/**
 * Report how long a driver operation took
 */
export function exportLatencyLog(
  factory: TelemetryClientFactory,
  context: ConnectionContext | undefined,
  operation: string,
  latencyMs: number,
  statementId?: string
): void {
  if (!context) {
    return;
  }

  const event = createTelemetryEvent(
    'latency',
    { operation, latencyMs, statementId },
    { connectionId: context.connectionId }
  );
  factory.getClient(context).exportEvent(event);
}
