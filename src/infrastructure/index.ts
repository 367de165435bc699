export { redisPlugin, publishTransition, startTransitionSubscriber, TRANSITION_CHANNEL } from './redis/index.js';
export { dbPlugin, createDbClient, createDbStores, ensureSchema } from './db/index.js';
export type { Database } from './db/index.js';
export { createInMemoryStores } from './memory/in-memory-stores.js';
export { loadNotificationConfig, createNotificationDispatcher } from './notifications/index.js';
export type { NotificationConfig, TransitionBroadcaster } from './notifications/index.js';
export { HttpSpokeClient, WsLogUpstreamConnector } from './spoke-client/index.js';
export { loadHubConfig } from './config/hub-config.js';
export type { HubConfig } from './config/hub-config.js';
export { loadAgentConfig } from './config/agent-config.js';
export type { AgentConfig } from './config/agent-config.js';
export { ConfigError } from './config/env.js';
