/**
 * One unit of delivery work: serialize a drained batch and push it
 */

import { errorMessage } from '../errors/index.js';
import { noopLogger, type Logger } from '../observability/logging.js';
import { serializeEvent, type EventSerializer } from './serializer.js';
import type { PushClientFactory, PushTarget, TelemetryEvent, TelemetryRequest } from './types.js';

export interface TelemetryPushTaskOptions {
  /** Snapshot drained from a client's queue */
  events: readonly TelemetryEvent[];
  target: PushTarget;
  pushClientFactory: PushClientFactory;
  serializer?: EventSerializer;
  logger?: Logger;
}

/**
 * Serializes each event on its own, so one bad event only drops itself, then
 * pushes the surviving batch once. The transport retries on its own terms; a
 * failed push is logged and dropped here.
 */
export class TelemetryPushTask {
  private readonly events: readonly TelemetryEvent[];
  private readonly target: PushTarget;
  private readonly pushClientFactory: PushClientFactory;
  private readonly serializer: EventSerializer;
  private readonly logger: Logger;

  constructor(options: TelemetryPushTaskOptions) {
    this.events = options.events;
    this.target = options.target;
    this.pushClientFactory = options.pushClientFactory;
    this.serializer = options.serializer ?? serializeEvent;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Never rejects
   */
  async run(): Promise<void> {
    this.logger.debug('Pushing telemetry logs', { size: this.events.length });
    if (this.events.length === 0) {
      return;
    }

    try {
      const request = this.buildRequest();
      const pushClient = this.pushClientFactory(this.target);
      await pushClient.pushEvent(request);
    } catch (error) {
      this.logger.trace('Failed to push telemetry logs', {
        connectionId: this.target.context.connectionId,
        error: errorMessage(error),
      });
    }
  }

  buildRequest(): TelemetryRequest {
    const protoLogs: string[] = [];
    for (const event of this.events) {
      try {
        protoLogs.push(this.serializer(event));
      } catch (error) {
        this.logger.error('Failed to serialize telemetry event', {
          eventId: event.eventId,
          kind: event.kind,
          error: errorMessage(error),
        });
      }
    }

    return {
      uploadTimeMillis: Date.now(),
      protoLogs,
    };
  }
}
