export type {
  SpokeStore, CommandStore, CommandUpdate, UserStore, SettingsStore, TransitionStore, TransitionQuery, HubStores,
} from './stores.js';
export { KeyedMutex } from './keyed-mutex.js';
export { ConcurrencyLimiter } from './concurrency-limiter.js';
export { AuthFailureLimiter } from './rate-limiter.js';
export { hashSecret, verifySecret, safeEqual, deriveKey, sealSecret, unsealSecret } from './secrets.js';
export { DashboardTokenCodec, RevocationList } from './token-codec.js';
export type { TokenClaims, IssuedToken, TokenVerification } from './token-codec.js';
export { AuthGate, verifySpokeCredential, normalizeIp } from './auth-gate.js';
export type { DashboardSession, SpokeCredential, SpokeCallVerdict } from './auth-gate.js';
export { FleetRegistry } from './fleet-registry.js';
export type { SpokeDescriptor, RegistrationResult } from './fleet-registry.js';
export { HeartbeatMonitor } from './heartbeat-monitor.js';
export type { SpokeProbe, SpokeStatusReport } from './heartbeat-monitor.js';
export { TransitionQueue } from './transition-queue.js';
export type { TransitionSink } from './transition-queue.js';
export { CommandDispatcher, DEFAULT_VERB_POLICY, INSTANCE_PATTERN, ACTION_PATTERN } from './command-dispatcher.js';
export type { CommandTransport, TransportResult, DispatchRequest, CompletionReport, VerbPolicy } from './command-dispatcher.js';
export { LogRelay } from './log-relay.js';
export type {
  LogDelivery, LogSubscriber, LogUpstream, LogUpstreamConnector, LogUpstreamHandlers, LogUpstreamOptions,
  SubscriptionHandle,
} from './log-relay.js';
export { createUser, changePassword, ensureBootstrapAdmin, toPublicUser } from './user-directory.js';
export type { PublicUser } from './user-directory.js';
export { getNotificationSettings, updateNotificationSettings, WEBHOOK_URL_SETTING } from './notification-settings.js';
export type { NotificationSettings } from './notification-settings.js';
export { createHub } from './hub.js';
export type { Hub, HubDeps, HubSettings, SpokeConnectors } from './hub.js';
export { registerSpokeSchema, spokeParamsSchema, heartbeatQuerySchema } from './spoke-schema.js';
export type { RegisterSpokeInput } from './spoke-schema.js';
export {
  issueCommandSchema, commandResultSchema, commandParamsSchema, commandResultParamsSchema, listCommandsQuerySchema,
} from './command-schema.js';
export type { IssueCommandInput, CommandResultInput } from './command-schema.js';
export { loginSchema, createUserSchema, changePasswordSchema, usernameParamsSchema } from './user-schema.js';
export type { CreateUserInput } from './user-schema.js';
export { notificationSettingsSchema, transitionQuerySchema } from './settings-schema.js';
