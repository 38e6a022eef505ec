/**
 * Per-connection telemetry client: queues events and flushes them on a shared pool
 */

import type { AuthProvider } from '../auth/index.js';
import { DEFAULTS, type ConnectionContext } from '../config/index.js';
import { errorMessage } from '../errors/index.js';
import { noopLogger, type Logger } from '../observability/logging.js';
import { TelemetryPushTask } from './push-task.js';
import type { EventSerializer } from './serializer.js';
import type { PushClientFactory, TelemetryClient, TelemetryEvent } from './types.js';
import type { WorkerPool } from './worker-pool.js';

export interface TelemetryClientOptions {
  context: ConnectionContext;
  /** null for a client of the unauthenticated endpoint */
  authProvider: AuthProvider | null;
  workerPool: WorkerPool;
  pushClientFactory: PushClientFactory;
  /** Queue length that triggers a flush (default: 200) */
  batchSize?: number;
  /** Periodic flush interval; 0 disables the timer (default: 5000) */
  flushIntervalMs?: number;
  serializer?: EventSerializer;
  logger?: Logger;
}

export class DefaultTelemetryClient implements TelemetryClient {
  private queue: TelemetryEvent[] = [];
  private readonly inFlight = new Set<Promise<void>>();
  private readonly options: TelemetryClientOptions;
  private readonly batchSize: number;
  private readonly logger: Logger;
  private flushTimer: NodeJS.Timeout | null = null;
  private closed = false;

  constructor(options: TelemetryClientOptions) {
    this.options = options;
    this.batchSize = options.batchSize ?? DEFAULTS.BATCH_SIZE;
    this.logger = options.logger ?? noopLogger;

    const interval = options.flushIntervalMs ?? DEFAULTS.FLUSH_INTERVAL_MS;
    if (interval > 0) {
      this.flushTimer = setInterval(() => {
        void this.flush();
      }, interval);
      this.flushTimer.unref();
    }
  }

  get isAuthenticated(): boolean {
    return this.options.authProvider !== null;
  }

  get queuedEventCount(): number {
    return this.queue.length;
  }

  exportEvent(event: TelemetryEvent): void {
    if (this.closed) {
      this.logger.debug('Dropping telemetry event for closed client', {
        connectionId: this.options.context.connectionId,
        eventId: event.eventId,
      });
      return;
    }

    this.queue.push(event);
    if (this.queue.length >= this.batchSize) {
      void this.flush();
    }
  }

  /**
   * Drain the queue into a push task on the worker pool.
   *
   * @returns settles when the submitted task finishes; never rejects
   */
  flush(): Promise<void> {
    const events = this.drain();
    if (events.length === 0) {
      return Promise.resolve();
    }

    const task = new TelemetryPushTask({
      events,
      target: { context: this.options.context, authProvider: this.options.authProvider },
      pushClientFactory: this.options.pushClientFactory,
      serializer: this.options.serializer,
      logger: this.logger,
    });

    const done: Promise<void> = this.options.workerPool
      .submit(() => task.run())
      .catch((error: unknown) => {
        this.logger.trace('Telemetry push task was not scheduled', {
          connectionId: this.options.context.connectionId,
          dropped: events.length,
          error: errorMessage(error),
        });
      })
      .finally(() => {
        this.inFlight.delete(done);
      });
    this.inFlight.add(done);
    return done;
  }

  /**
   * Stop the timer, flush what is left and wait for this client's pushes
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }

    await this.flush();
    await Promise.all([...this.inFlight]);
  }

  /**
   * Swap in a fresh queue. Producers append to the new array from here on, so
   * the returned snapshot is never touched again.
   */
  private drain(): readonly TelemetryEvent[] {
    const drained = this.queue;
    this.queue = [];
    return Object.freeze(drained);
  }
}
