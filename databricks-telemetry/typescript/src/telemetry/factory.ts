/**
 * Process-wide registry of per-connection telemetry clients
 */

import { resolveAuthProvider, type AuthProvider, type AuthResolver } from '../auth/index.js';
import {
  createCircuitBreakerConfig,
  isTelemetryAllowed,
  resolveTelemetrySettings,
  type ConnectionContext,
} from '../config/index.js';
import { errorMessage } from '../errors/index.js';
import { noopLogger, type Logger } from '../observability/logging.js';
import { CircuitBreakerRegistry } from '../resilience/registry.js';
import { CircuitBreakerTelemetryClient } from './circuit-breaker-client.js';
import { DefaultTelemetryClient } from './client.js';
import { NoopTelemetryClient } from './noop-client.js';
import { CircuitBreakerPushClient, HttpTelemetryPushClient } from './push-client.js';
import type { EventSerializer } from './serializer.js';
import type { PushClientFactory, PushTarget, TelemetryClient, TelemetryPushClient } from './types.js';
import { WorkerPool } from './worker-pool.js';

export interface TelemetryClientFactoryOptions {
  /** Shared pool for push tasks; created with `workerPoolSize` when absent */
  workerPool?: WorkerPool;
  workerPoolSize?: number;
  authResolver?: AuthResolver;
  /** Policy deciding whether a connection gets telemetry at all */
  telemetryAllowed?: (context: ConnectionContext) => boolean;
  /** Transport for a batch; breaker wrapping is applied on top of it */
  pushClientFactory?: PushClientFactory;
  serializer?: EventSerializer;
  logger?: Logger;
}

const defaultPushClientFactory: PushClientFactory = (target) =>
  new HttpTelemetryPushClient({
    hostUrl: target.context.hostUrl,
    authProvider: target.authProvider,
  });

/**
 * Owns the lifecycle of telemetry clients, one per connection id and
 * authentication mode, plus the worker pool their pushes run on.
 *
 * Connections whose credentials resolve get a client in the authenticated map.
 * Connections whose credentials do not resolve (for example because connection
 * setup failed) still get a client for the unauthenticated endpoint. Both maps
 * can hold an entry for the same id; closeClient removes both.
 *
 * @example
 * ```typescript
 * const factory = new TelemetryClientFactory({ logger: new ConsoleLogger() });
 * factory.getClient(context).exportEvent(event);
 * await factory.closeClient(context);
 * ```
 */
export class TelemetryClientFactory {
  private static instance: TelemetryClientFactory | null = null;

  private readonly authenticatedClients = new Map<string, TelemetryClient>();
  private readonly unauthenticatedClients = new Map<string, TelemetryClient>();
  private readonly workerPool: WorkerPool;
  private readonly pushBreakers: CircuitBreakerRegistry;
  private readonly authResolver: AuthResolver;
  private readonly telemetryAllowed: (context: ConnectionContext) => boolean;
  private readonly transportFactory: PushClientFactory;
  private readonly serializer?: EventSerializer;
  private readonly logger: Logger;

  constructor(options: TelemetryClientFactoryOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    this.workerPool = options.workerPool ?? new WorkerPool(options.workerPoolSize);
    this.pushBreakers = new CircuitBreakerRegistry({ logger: this.logger });
    this.authResolver = options.authResolver ?? resolveAuthProvider;
    this.telemetryAllowed = options.telemetryAllowed ?? isTelemetryAllowed;
    this.transportFactory = options.pushClientFactory ?? defaultPushClientFactory;
    this.serializer = options.serializer;
  }

  /**
   * Get the process-wide factory, creating it on first use
   */
  static getInstance(options?: TelemetryClientFactoryOptions): TelemetryClientFactory {
    if (!TelemetryClientFactory.instance) {
      TelemetryClientFactory.instance = new TelemetryClientFactory(options);
    }
    return TelemetryClientFactory.instance;
  }

  /**
   * Close every client of the process-wide factory and forget it (useful for testing)
   */
  static async resetInstance(): Promise<void> {
    const instance = TelemetryClientFactory.instance;
    TelemetryClientFactory.instance = null;
    await instance?.reset();
  }

  /**
   * Client for a connection. Never throws: any failure yields the no-op client.
   */
  getClient(context: ConnectionContext): TelemetryClient {
    try {
      if (!this.telemetryAllowed(context)) {
        return NoopTelemetryClient.getInstance();
      }

      const authProvider = this.resolveAuth(context);
      const clients = authProvider ? this.authenticatedClients : this.unauthenticatedClients;

      let client = clients.get(context.connectionId);
      if (!client) {
        client = this.createClient(context, authProvider);
        clients.set(context.connectionId, client);
      }
      return client;
    } catch (error) {
      this.logger.debug('Telemetry client unavailable, using no-op client', {
        connectionId: context.connectionId,
        error: errorMessage(error),
      });
      return NoopTelemetryClient.getInstance();
    }
  }

  /**
   * Remove and close both clients of a connection. Idempotent; never rejects.
   */
  async closeClient(context: ConnectionContext): Promise<void> {
    const id = context.connectionId;
    const authenticated = this.take(this.authenticatedClients, id);
    const unauthenticated = this.take(this.unauthenticatedClients, id);

    await Promise.all([
      this.closeQuietly(authenticated, 'telemetry client', id),
      this.closeQuietly(unauthenticated, 'unauthenticated telemetry client', id),
    ]);
  }

  /**
   * Close every live client and clear both maps
   */
  async reset(): Promise<void> {
    const authenticated = [...this.authenticatedClients.entries()];
    const unauthenticated = [...this.unauthenticatedClients.entries()];
    this.authenticatedClients.clear();
    this.unauthenticatedClients.clear();

    await Promise.all([
      ...authenticated.map(([id, client]) => this.closeQuietly(client, 'telemetry client', id)),
      ...unauthenticated.map(([id, client]) =>
        this.closeQuietly(client, 'unauthenticated telemetry client', id)
      ),
    ]);
    this.pushBreakers.clear();
  }

  getWorkerPool(): WorkerPool {
    return this.workerPool;
  }

  /**
   * Shared breakers guarding pushes, one per collector host
   */
  getPushCircuitBreakers(): CircuitBreakerRegistry {
    return this.pushBreakers;
  }

  /** Number of live clients, authenticated and unauthenticated */
  get clientCount(): { authenticated: number; unauthenticated: number } {
    return {
      authenticated: this.authenticatedClients.size,
      unauthenticated: this.unauthenticatedClients.size,
    };
  }

  private resolveAuth(context: ConnectionContext): AuthProvider | null {
    try {
      return this.authResolver(context);
    } catch (error) {
      this.logger.debug('Using unauthenticated telemetry', {
        connectionId: context.connectionId,
        reason: errorMessage(error),
      });
      return null;
    }
  }

  private createClient(context: ConnectionContext, authProvider: AuthProvider | null): TelemetryClient {
    const settings = resolveTelemetrySettings(context);
    const baseClient = new DefaultTelemetryClient({
      context,
      authProvider,
      workerPool: this.workerPool,
      pushClientFactory: this.createPushClient,
      batchSize: settings.batchSize,
      flushIntervalMs: settings.flushIntervalMs,
      serializer: this.serializer,
      logger: this.logger,
    });

    if (!settings.circuitBreaker) {
      return baseClient;
    }
    return new CircuitBreakerTelemetryClient(baseClient, settings.circuitBreaker, {
      name: `telemetry-client:${context.connectionId}`,
      logger: this.logger,
    });
  }

  private readonly createPushClient = (target: PushTarget): TelemetryPushClient => {
    const transport = this.transportFactory(target);
    const config = createCircuitBreakerConfig(target.context);
    if (!config) {
      return transport;
    }
    const breaker = this.pushBreakers.getOrCreate(`telemetry-push:${target.context.hostUrl}`, config);
    return new CircuitBreakerPushClient(transport, breaker);
  };

  private take(clients: Map<string, TelemetryClient>, id: string): TelemetryClient | undefined {
    const client = clients.get(id);
    clients.delete(id);
    return client;
  }

  private async closeQuietly(
    client: TelemetryClient | undefined,
    clientType: string,
    connectionId: string
  ): Promise<void> {
    if (!client) {
      return;
    }
    try {
      await client.close();
    } catch (error) {
      this.logger.debug(`Caught error while closing ${clientType}`, {
        connectionId,
        error: errorMessage(error),
      });
    }
  }
}
