import type { Logger } from 'pino';
import type { TransitionEvent } from '../../domain/index.js';
import type { SettingsStore } from '../../application/stores.js';
import type { NotificationConfig } from './config.js';
import { sendWebhookNotification } from './webhook.js';

export interface TransitionBroadcaster {
  broadcastTransition(event: TransitionEvent): void;
}

/**
 * Dispatches a transition event to every configured channel.
 *
 * Each channel runs independently; a failure in one never prevents the
 * others. Nothing here throws back into the subscriber loop.
 */
export function createNotificationDispatcher(
  config: NotificationConfig,
  settings: SettingsStore,
  log: Logger,
  broadcaster: TransitionBroadcaster | null,
): (event: TransitionEvent) => void {
  return (event) => {
    if (config.websocket.enabled && broadcaster) {
      try {
        broadcaster.broadcastTransition(event);
      } catch (err: unknown) {
        log.warn({ err, event_id: event.event_id }, 'WebSocket broadcast failed');
      }
    }

    void sendWebhookNotification(config.webhook, settings, log, event).catch((err: unknown) => {
      log.warn({ err, event_id: event.event_id }, 'Webhook dispatch failed');
    });
  };
}
