import type { TelemetryClient, TelemetryEvent } from './types.js';

/**
 * Client used when telemetry is disabled for a connection: queues nothing, sends nothing
 */
export class NoopTelemetryClient implements TelemetryClient {
  private static readonly instance = new NoopTelemetryClient();

  static getInstance(): NoopTelemetryClient {
    return NoopTelemetryClient.instance;
  }

  private constructor() {}

  exportEvent(_event: TelemetryEvent): void {}

  async close(): Promise<void> {}
}
