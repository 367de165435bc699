import Fastify from 'fastify';
import type { Logger } from 'pino';

import { createHub } from './application/index.js';
import type { HubDeps, HubStores } from './application/index.js';
import type { TransitionEvent } from './domain/index.js';
import {
  createDbStores,
  createInMemoryStores,
  createNotificationDispatcher,
  dbPlugin,
  HttpSpokeClient,
  loadNotificationConfig,
  publishTransition,
  redisPlugin,
  startTransitionSubscriber,
  WsLogUpstreamConnector,
} from './infrastructure/index.js';
import type { HubConfig, NotificationConfig } from './infrastructure/index.js';
import {
  authRoutes,
  commandRoutes,
  errorHandler,
  healthRoutes,
  hubPlugin,
  settingsRoutes,
  spokeRoutes,
  transitionRoutes,
  userRoutes,
} from './interfaces/http/index.js';
import { DashboardSocketServer } from './interfaces/ws/websocket-server.js';

export interface HubServerOverrides {
  stores?: HubStores;
  connectors?: HubDeps['connectors'];
  notifications?: NotificationConfig;
}

function httpConnectors(log: Logger): HubDeps['connectors'] {
  return (revealKey) => {
    const http = new HttpSpokeClient(revealKey);
    return {
      probe: http,
      transport: http,
      logs: new WsLogUpstreamConnector(revealKey, log.child({ component: 'log-upstream' })),
    };
  };
}

/**
 * Builds the hub server without starting it.
 *
 * Order:
 * 1) Storage and messaging plugins
 * 2) Notification pipeline (Redis subscriber or in-process)
 * 3) Hub core, HTTP routes, dashboard WebSocket
 * 4) Shutdown hook
 *
 * Every transition path is live before the caller runs `hub.start()`, so
 * the first polls after a restart are delivered like any other.
 */
export async function buildHubServer(config: HubConfig, log: Logger, overrides: HubServerOverrides = {}) {
  const fastify = Fastify({ loggerInstance: log });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  let stores: HubStores;
  if (overrides.stores !== undefined) {
    stores = overrides.stores;
  } else if (config.storage === 'memory') {
    log.warn('STORAGE=memory: nothing is persisted across restarts');
    stores = createInMemoryStores();
  } else {
    await fastify.register(dbPlugin, { databaseUrl: config.databaseUrl });
    stores = createDbStores(fastify.db);
  }

  const notifConfig = overrides.notifications ?? loadNotificationConfig(config.notificationsConfigPath ?? undefined);
  log.info(
    { websocket: notifConfig.websocket.enabled, webhook: notifConfig.webhook.enabled },
    'Notification config loaded',
  );

  // wsServer is created below; nothing is broadcast before hub.start()
  const notify = createNotificationDispatcher(
    notifConfig,
    stores.settings,
    log.child({ component: 'notifications' }),
    notifConfig.websocket.enabled
      ? { broadcastTransition: (event: TransitionEvent) => wsServer.broadcastTransition(event) }
      : null,
  );

  let publish: (event: TransitionEvent) => Promise<void>;
  let cleanupSubscriber: null | (() => Promise<void>) = null;
  if (config.redisUrl !== null) {
    await fastify.register(redisPlugin, { redisUrl: config.redisUrl });
    cleanupSubscriber = await startTransitionSubscriber(
      config.redisUrl,
      log.child({ component: 'transition-subscriber' }),
      notify,
    );
    publish = (event) => publishTransition(fastify.redis, log, event);
  } else {
    log.info('REDIS_URL unset: transition events are delivered in-process');
    publish = async (event) => notify(event);
  }

  // --------------------------------------------------
  // Hub core + HTTP interface
  // --------------------------------------------------

  const hub = createHub({
    settings: config,
    stores,
    log,
    publishTransition: publish,
    connectors: overrides.connectors ?? httpConnectors(log),
  });

  await fastify.register(errorHandler);
  await fastify.register(hubPlugin, { hub });
  await fastify.register(healthRoutes);
  await fastify.register(authRoutes);
  await fastify.register(spokeRoutes);
  await fastify.register(commandRoutes);
  await fastify.register(transitionRoutes);
  await fastify.register(settingsRoutes);
  await fastify.register(userRoutes);

  const wsServer = new DashboardSocketServer(log.child({ component: 'dashboard-ws' }), hub.auth, hub.relay);
  wsServer.attach(fastify.server);

  // onClose MUST be registered before listen()
  fastify.addHook('onClose', async () => {
    wsServer.close();
    await hub.stop();
    if (cleanupSubscriber) {
      await cleanupSubscriber();
    }
  });

  return { fastify, hub, wsServer };
}
