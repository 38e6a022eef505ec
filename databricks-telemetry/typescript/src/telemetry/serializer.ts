/**
 * Event construction and serialization
 */

import { randomUUID } from 'crypto';
import { SerializationError, errorMessage } from '../errors/index.js';
import type { TelemetryEvent, TelemetryEventKind } from './types.js';

export type EventSerializer = (event: TelemetryEvent) => string;

/**
 * Create an event stamped with a fresh id and the current time
 */
export function createTelemetryEvent(
  kind: TelemetryEventKind,
  payload: Record<string, unknown>,
  options: { connectionId?: string; timestampMillis?: number } = {}
): TelemetryEvent {
  return Object.freeze({
    eventId: randomUUID(),
    kind,
    timestampMillis: options.timestampMillis ?? Date.now(),
    connectionId: options.connectionId,
    payload: Object.freeze({ ...payload }),
  });
}

function omitNullFields(_key: string, value: unknown): unknown {
  return value === null ? undefined : value;
}

/**
 * Serialize an event to JSON, leaving out null and undefined fields at every depth
 *
 * @throws SerializationError for values JSON cannot represent (BigInt, cycles)
 */
export const serializeEvent: EventSerializer = (event) => {
  let json: string | undefined;
  try {
    json = JSON.stringify(event, omitNullFields);
  } catch (error) {
    throw new SerializationError(
      `Failed to serialize telemetry event ${event.eventId}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
  if (json === undefined) {
    throw new SerializationError(`Telemetry event ${event.eventId} produced no JSON`);
  }
  return json;
};
