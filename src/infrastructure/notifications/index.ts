export { loadNotificationConfig, DEFAULT_CONFIG } from './config.js';
export type { NotificationConfig } from './config.js';
export { sendWebhookNotification, buildWebhookPayload } from './webhook.js';
export type { TransitionWebhookPayload } from './webhook.js';
export { createNotificationDispatcher } from './dispatcher.js';
export type { TransitionBroadcaster } from './dispatcher.js';
