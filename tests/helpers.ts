import { vi } from 'vitest';
import type { Logger } from 'pino';
import { FleetRegistry } from '../src/application/fleet-registry.js';
import { deriveKey } from '../src/application/secrets.js';
import { InMemorySpokeStore } from '../src/infrastructure/memory/in-memory-stores.js';
import type { SpokeStore } from '../src/application/stores.js';
import type { HubSettings, SpokeConnectors } from '../src/application/hub.js';
import type { TransportResult } from '../src/application/command-dispatcher.js';

export const TEST_SECRET = 'test-secret-test-secret-test-secret';
export const TEST_API_KEY = 'test-api-key-0001';

export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger;
}

/** Lets queued promise callbacks and immediates run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function makeRegistry(store: SpokeStore = new InMemorySpokeStore(), log: Logger = fakeLogger()) {
  return new FleetRegistry({
    store,
    sealKey: deriveKey(TEST_SECRET, 'spoke-api-keys'),
    log,
  });
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (err: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function testHubSettings(overrides: Partial<HubSettings> = {}): HubSettings {
  return {
    hubSecret: TEST_SECRET,
    tokenTtlSeconds: 3600,
    heartbeat: { intervalMs: 60_000, timeoutMs: 1_000, jitterMs: 0, degradedAfter: 2, offlineAfter: 3 },
    outboundConcurrency: 4,
    commands: { ackTimeoutMs: 5_000, completionTimeoutMs: 60_000, allowDegradedDispatch: true },
    logs: { replayLines: 100, subscriberBuffer: 500, reconnectDelayMs: 5_000 },
    auth: { maxFailures: 5, windowMs: 60_000, maxOrigins: 100 },
    bootstrapAdminPassword: 'test-password',
    ...overrides,
  };
}

/** Outbound adapters that never touch the network. */
export function fakeConnectors(
  unreachable: ReadonlySet<string> = new Set(),
): SpokeConnectors & { upstreams: Array<{ closed: boolean }> } {
  const upstreams: Array<{ closed: boolean }> = [];
  return {
    upstreams,
    probe: {
      probe: async (spoke) => {
        if (unreachable.has(spoke.address)) throw new Error('connect ECONNREFUSED');
        return { sessions: [], metrics: { cpu_percent: 1, ram_percent: 2, disk_percent: 3 } };
      },
    },
    transport: {
      send: (_spoke, _command, signal) =>
        new Promise<TransportResult>((_resolve, reject) => {
          signal.addEventListener('abort', () => reject(signal.reason));
        }),
    },
    logs: {
      open: () => {
        const upstream = { closed: false, close: () => { upstream.closed = true; } };
        upstreams.push(upstream);
        return upstream;
      },
    },
  };
}
