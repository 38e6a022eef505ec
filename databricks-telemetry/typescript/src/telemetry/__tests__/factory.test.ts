import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { TelemetryClientFactory } from '../factory.js';
import { CircuitBreakerTelemetryClient } from '../circuit-breaker-client.js';
import { DefaultTelemetryClient } from '../client.js';
import { NoopTelemetryClient } from '../noop-client.js';
import { WorkerPool } from '../worker-pool.js';
import { createTelemetryEvent } from '../serializer.js';
import { StaticTokenAuthProvider, type AuthResolver } from '../../auth/index.js';
import { ConnectionRefused, MissingCredentials } from '../../errors/index.js';
import {
  HOST_URL,
  createContext,
  createFakeTransport,
  createMockLogger,
} from './fixtures.js';

describe('TelemetryClientFactory', () => {
  let pool: WorkerPool;
  let transport: ReturnType<typeof createFakeTransport>;
  let logger: ReturnType<typeof createMockLogger>;
  let factory: TelemetryClientFactory;

  beforeEach(() => {
    pool = new WorkerPool(2);
    transport = createFakeTransport();
    logger = createMockLogger();
    factory = new TelemetryClientFactory({
      workerPool: pool,
      pushClientFactory: transport.pushClientFactory,
      logger,
    });
  });

  afterEach(async () => {
    await factory.reset();
    vi.restoreAllMocks();
  });

  /** Fails to resolve credentials while `failing` is set */
  function toggledResolver(): { resolver: AuthResolver; setFailing(failing: boolean): void } {
    let failing = true;
    return {
      resolver: (context) => {
        if (failing) {
          throw new MissingCredentials(context.connectionId);
        }
        return new StaticTokenAuthProvider('test-token');
      },
      setFailing: (value) => {
        failing = value;
      },
    };
  }

  describe('getClient', () => {
    it('returns the same client for the same connection', () => {
      const context = createContext();

      const first = factory.getClient(context);
      const second = factory.getClient(createContext());

      expect(second).toBe(first);
      expect(first).toBeInstanceOf(CircuitBreakerTelemetryClient);
      expect(factory.clientCount).toEqual({ authenticated: 1, unauthenticated: 0 });
    });

    it('keeps connections apart', () => {
      const first = factory.getClient(createContext('conn-1'));
      const second = factory.getClient(createContext('conn-2'));

      expect(second).not.toBe(first);
      expect(factory.clientCount).toEqual({ authenticated: 2, unauthenticated: 0 });
    });

    it('returns the no-op client when telemetry is disabled', () => {
      const client = factory.getClient(createContext('conn-1', { PWD: 'test-token', EnableTelemetry: 'false' }));

      expect(client).toBe(NoopTelemetryClient.getInstance());
      expect(factory.clientCount).toEqual({ authenticated: 0, unauthenticated: 0 });
    });

    it('falls back to an unauthenticated client without credentials', () => {
      factory.getClient(createContext('conn-1', {}));

      expect(factory.clientCount).toEqual({ authenticated: 0, unauthenticated: 1 });
      expect(logger.debug).toHaveBeenCalledWith('Using unauthenticated telemetry', {
        connectionId: 'conn-1',
        reason: 'No credentials available for connection: conn-1',
      });
    });

    it('skips the circuit breaker when disabled', () => {
      const client = factory.getClient(
        createContext('conn-1', { PWD: 'test-token', 'telemetry.circuit.breaker.enabled': 'false' })
      );

      expect(client).toBeInstanceOf(DefaultTelemetryClient);
    });

    it('returns the no-op client when client creation fails', () => {
      const failing = new TelemetryClientFactory({
        workerPool: pool,
        telemetryAllowed: () => {
          throw new Error('policy failed');
        },
        logger,
      });

      expect(failing.getClient(createContext())).toBe(NoopTelemetryClient.getInstance());
      expect(logger.debug).toHaveBeenCalledWith('Telemetry client unavailable, using no-op client', {
        connectionId: 'conn-1',
        error: 'policy failed',
      });
    });
  });

  describe('closeClient', () => {
    it('creates a new client after close', async () => {
      const context = createContext();
      const first = factory.getClient(context);

      await factory.closeClient(context);

      expect(factory.clientCount).toEqual({ authenticated: 0, unauthenticated: 0 });
      expect(factory.getClient(context)).not.toBe(first);
    });

    it('is idempotent', async () => {
      const context = createContext();
      const client = factory.getClient(context);
      const close = vi.spyOn(client, 'close');

      await factory.closeClient(context);
      await factory.closeClient(context);
      await expect(factory.closeClient(createContext('never-opened'))).resolves.toBeUndefined();

      expect(close).toHaveBeenCalledTimes(1);
    });

    it('closes both clients of a connection', async () => {
      const { resolver, setFailing } = toggledResolver();
      const twoModes = new TelemetryClientFactory({
        workerPool: pool,
        authResolver: resolver,
        pushClientFactory: transport.pushClientFactory,
      });
      const context = createContext();

      const unauthenticated = twoModes.getClient(context);
      setFailing(false);
      const authenticated = twoModes.getClient(context);

      expect(authenticated).not.toBe(unauthenticated);
      expect(twoModes.clientCount).toEqual({ authenticated: 1, unauthenticated: 1 });

      await twoModes.closeClient(context);

      expect(twoModes.clientCount).toEqual({ authenticated: 0, unauthenticated: 0 });
    });

    it('logs close failures and still closes the other client', async () => {
      const { resolver, setFailing } = toggledResolver();
      const twoModes = new TelemetryClientFactory({
        workerPool: pool,
        authResolver: resolver,
        pushClientFactory: transport.pushClientFactory,
        logger,
      });
      const context = createContext();
      const unauthenticated = twoModes.getClient(context);
      setFailing(false);
      const authenticated = twoModes.getClient(context);
      vi.spyOn(authenticated, 'close').mockRejectedValue(new Error('close failed'));
      const unauthenticatedClose = vi.spyOn(unauthenticated, 'close');

      await expect(twoModes.closeClient(context)).resolves.toBeUndefined();

      expect(unauthenticatedClose).toHaveBeenCalledTimes(1);
      expect(logger.debug).toHaveBeenCalledWith('Caught error while closing telemetry client', {
        connectionId: 'conn-1',
        error: 'close failed',
      });
    });
  });

  describe('delivery', () => {
    it('pushes a full batch through the shared pool', async () => {
      const context = createContext('conn-1', { PWD: 'test-token', TelemetryBatchSize: '2' });
      const client = factory.getClient(context);

      client.exportEvent(createTelemetryEvent('usage', { action: 'connect' }, { connectionId: 'conn-1' }));
      client.exportEvent(createTelemetryEvent('usage', { action: 'execute' }, { connectionId: 'conn-1' }));
      await pool.onIdle();

      expect(transport.pushEvent).toHaveBeenCalledTimes(1);
      expect(transport.pushEvent.mock.calls[0]?.[0].protoLogs).toHaveLength(2);
      expect(transport.pushClientFactory).toHaveBeenCalledWith({
        context,
        authProvider: expect.any(StaticTokenAuthProvider),
      });
    });

    it('flushes queued events when the client is closed', async () => {
      const context = createContext();
      factory.getClient(context).exportEvent(createTelemetryEvent('usage', {}));

      await factory.closeClient(context);

      expect(transport.pushEvent).toHaveBeenCalledTimes(1);
    });

    it('shares one push breaker per host', async () => {
      const properties = { PWD: 'test-token', TelemetryBatchSize: '1' };
      factory.getClient(createContext('conn-1', properties)).exportEvent(createTelemetryEvent('usage', {}));
      factory.getClient(createContext('conn-2', properties)).exportEvent(createTelemetryEvent('usage', {}));
      await pool.onIdle();

      const breakers = factory.getPushCircuitBreakers();
      expect(breakers.size).toBe(1);
      expect(breakers.get(`telemetry-push:${HOST_URL}`)?.metrics().succeeded).toBe(2);
    });

    it('stops pushing to a failing host', async () => {
      transport.pushEvent.mockRejectedValue(new ConnectionRefused(HOST_URL));
      const client = factory.getClient(
        createContext('conn-1', {
          PWD: 'test-token',
          TelemetryBatchSize: '1',
          'telemetry.circuit.breaker.min.calls': '2',
          'telemetry.circuit.breaker.window.size': '2',
        })
      );

      for (let i = 0; i < 3; i++) {
        client.exportEvent(createTelemetryEvent('usage', { attempt: i }));
        await pool.onIdle();
      }

      expect(transport.pushEvent).toHaveBeenCalledTimes(2);
      expect(factory.getPushCircuitBreakers().get(`telemetry-push:${HOST_URL}`)?.currentState()).toBe('open');
    });
  });

  describe('reset', () => {
    it('closes every client and forgets the push breakers', async () => {
      factory.getClient(createContext('conn-1'));
      factory.getClient(createContext('conn-2', {}));
      factory.getClient(createContext('conn-3', { PWD: 'test-token', TelemetryBatchSize: '1' })).exportEvent(
        createTelemetryEvent('usage', {})
      );
      await pool.onIdle();

      await factory.reset();

      expect(factory.clientCount).toEqual({ authenticated: 0, unauthenticated: 0 });
      expect(factory.getPushCircuitBreakers().size).toBe(0);
    });
  });

  describe('getInstance', () => {
    afterEach(async () => {
      await TelemetryClientFactory.resetInstance();
    });

    it('returns the process-wide factory until reset', async () => {
      const instance = TelemetryClientFactory.getInstance();

      expect(TelemetryClientFactory.getInstance()).toBe(instance);

      await TelemetryClientFactory.resetInstance();

      expect(TelemetryClientFactory.getInstance()).not.toBe(instance);
    });
  });
});
