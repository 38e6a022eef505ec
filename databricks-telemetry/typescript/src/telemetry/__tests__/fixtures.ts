import { vi } from 'vitest';
import type { ConnectionContext } from '../../config/index.js';
import type { PushTarget, TelemetryEvent, TelemetryPushClient, TelemetryRequest } from '../types.js';

export const HOST_URL = 'https://example.cloud.databricks.com';

export function createMockLogger() {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function createContext(
  connectionId: string = 'conn-1',
  properties: Record<string, string> = { PWD: 'test-token' }
): ConnectionContext {
  return { connectionId, hostUrl: HOST_URL, properties };
}

export function createEvent(eventId: string, payload: Record<string, unknown> = {}): TelemetryEvent {
  return { eventId, kind: 'usage', timestampMillis: 1000, payload };
}

/**
 * Transport double that records every request it is asked to push
 */
export function createFakeTransport() {
  const pushEvent = vi.fn<(request: TelemetryRequest) => Promise<void>>().mockResolvedValue(undefined);
  const transport: TelemetryPushClient = { pushEvent };
  const pushClientFactory = vi.fn((_target: PushTarget): TelemetryPushClient => transport);
  return { pushEvent, pushClientFactory };
}
