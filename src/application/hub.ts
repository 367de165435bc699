import type { Logger } from 'pino';
import type { Spoke, TransitionEvent } from '../domain/index.js';
import type { HubStores } from './stores.js';
import { AuthFailureLimiter } from './rate-limiter.js';
import { AuthGate } from './auth-gate.js';
import { CommandDispatcher } from './command-dispatcher.js';
import type { CommandTransport, VerbPolicy } from './command-dispatcher.js';
import { ConcurrencyLimiter } from './concurrency-limiter.js';
import { FleetRegistry } from './fleet-registry.js';
import { HeartbeatMonitor } from './heartbeat-monitor.js';
import type { SpokeProbe } from './heartbeat-monitor.js';
import { LogRelay } from './log-relay.js';
import type { LogUpstreamConnector } from './log-relay.js';
import { DashboardTokenCodec } from './token-codec.js';
import { deriveKey } from './secrets.js';
import { ensureBootstrapAdmin } from './user-directory.js';

/** Runtime knobs the hub core needs; the env config satisfies this shape. */
export interface HubSettings {
  hubSecret: string;
  tokenTtlSeconds: number;
  heartbeat: {
    intervalMs: number;
    timeoutMs: number;
    jitterMs: number;
    degradedAfter: number;
    offlineAfter: number;
  };
  outboundConcurrency: number;
  commands: {
    ackTimeoutMs: number;
    completionTimeoutMs: number;
    allowDegradedDispatch: boolean;
  };
  logs: {
    replayLines: number;
    subscriberBuffer: number;
    reconnectDelayMs: number;
  };
  auth: {
    maxFailures: number;
    windowMs: number;
    maxOrigins: number;
  };
  bootstrapAdminPassword: string | null;
}

/** Outbound adapters towards spoke agents, built once the hub can reveal spoke keys. */
export interface SpokeConnectors {
  probe: SpokeProbe;
  transport: CommandTransport;
  logs: LogUpstreamConnector;
}

export interface HubDeps {
  settings: HubSettings;
  stores: HubStores;
  log: Logger;
  connectors: (revealKey: (spoke: Spoke) => string) => SpokeConnectors;
  /** Fan-out of transition events (Redis or in-process). Best effort. */
  publishTransition: (event: TransitionEvent) => Promise<void>;
  verbPolicy?: VerbPolicy;
  nowFn?: () => number;
}

export interface Hub {
  readonly auth: AuthGate;
  readonly registry: FleetRegistry;
  readonly monitor: HeartbeatMonitor;
  readonly dispatcher: CommandDispatcher;
  readonly relay: LogRelay;
  readonly stores: HubStores;
  start(): Promise<void>;
  stop(): Promise<void>;
}

const LIMITER_SWEEP_MS = 60_000;

/**
 * Wires the hub components together.
 *
 * Registration starts a heartbeat task; removal cancels everything the
 * spoke owns (heartbeat task, open commands, log streams). Transitions
 * are recorded in history before being published. Start settles the
 * commands a previous process left open before any new dispatch.
 */
export function createHub(deps: HubDeps): Hub {
  const { settings, stores, log } = deps;
  const nowFn = deps.nowFn ?? Date.now;

  const registry = new FleetRegistry({
    store: stores.spokes,
    sealKey: deriveKey(settings.hubSecret, 'spoke-api-keys'),
    log: log.child({ component: 'fleet-registry' }),
    nowFn,
  });

  const connectors = deps.connectors((spoke) => registry.revealApiKey(spoke));

  const limiter = new AuthFailureLimiter({
    maxFailures: settings.auth.maxFailures,
    windowMs: settings.auth.windowMs,
    maxOrigins: settings.auth.maxOrigins,
    nowFn,
  });

  const auth = new AuthGate({
    users: stores.users,
    spokes: registry,
    tokens: new DashboardTokenCodec(deriveKey(settings.hubSecret, 'session-tokens'), settings.tokenTtlSeconds, nowFn),
    limiter,
    log: log.child({ component: 'auth-gate' }),
  });

  const monitorLog = log.child({ component: 'heartbeat-monitor' });
  const monitor = new HeartbeatMonitor({
    registry,
    probe: connectors.probe,
    limiter: new ConcurrencyLimiter(settings.outboundConcurrency),
    log: monitorLog,
    intervalMs: settings.heartbeat.intervalMs,
    timeoutMs: settings.heartbeat.timeoutMs,
    jitterMs: settings.heartbeat.jitterMs,
    thresholds: {
      degradedAfter: settings.heartbeat.degradedAfter,
      offlineAfter: settings.heartbeat.offlineAfter,
    },
    nowFn,
    sink: async (event) => {
      try {
        await stores.transitions.insert(event);
      } catch (err: unknown) {
        monitorLog.error({ err, event_id: event.event_id }, 'Failed to record transition history');
      }
      await deps.publishTransition(event);
    },
  });

  const dispatcher = new CommandDispatcher({
    registry,
    store: stores.commands,
    transport: connectors.transport,
    log: log.child({ component: 'command-dispatcher' }),
    ackTimeoutMs: settings.commands.ackTimeoutMs,
    completionTimeoutMs: settings.commands.completionTimeoutMs,
    allowDegradedDispatch: settings.commands.allowDegradedDispatch,
    verbPolicy: deps.verbPolicy,
    nowFn,
  });

  const relay = new LogRelay({
    connector: connectors.logs,
    resolveSpoke: (spokeId) => registry.get(spokeId),
    log: log.child({ component: 'log-relay' }),
    replayLines: settings.logs.replayLines,
    bufferSize: settings.logs.subscriberBuffer,
    reconnectDelayMs: settings.logs.reconnectDelayMs,
  });

  registry.onRegistered((spoke) => monitor.track(spoke.id));
  registry.onRemoved(async (spoke) => {
    monitor.untrack(spoke.id);
    relay.closeSpoke(spoke.id);
    await dispatcher.cancelForSpoke(spoke.id);
  });

  let sweepTimer: NodeJS.Timeout | null = null;

  return {
    auth,
    registry,
    monitor,
    dispatcher,
    relay,
    stores,
    async start() {
      await registry.hydrate();
      await dispatcher.recover();
      await ensureBootstrapAdmin(stores.users, settings.bootstrapAdminPassword, log);
      monitor.start();
      sweepTimer = setInterval(() => limiter.sweep(), LIMITER_SWEEP_MS);
      sweepTimer.unref();
    },
    async stop() {
      if (sweepTimer !== null) clearInterval(sweepTimer);
      sweepTimer = null;
      monitor.stop();
      relay.stop();
      dispatcher.stop();
    },
  };
}
