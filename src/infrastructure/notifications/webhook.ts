import type { Logger } from 'pino';
import type { TransitionEvent } from '../../domain/index.js';
import type { SettingsStore } from '../../application/stores.js';
import { getNotificationSettings } from '../../application/notification-settings.js';
import type { NotificationConfig } from './config.js';

/** Body POSTed to the operator webhook. `content` makes Discord-style hooks render it. */
export interface TransitionWebhookPayload {
  spoke_id: string;
  spoke_name: string;
  from_status: string;
  to_status: string;
  timestamp: string;
  content: string;
}

export function buildWebhookPayload(event: TransitionEvent): TransitionWebhookPayload {
  return {
    spoke_id: event.spoke_id,
    spoke_name: event.spoke_name,
    from_status: event.from_status,
    to_status: event.to_status,
    timestamp: event.timestamp,
    content: `Spoke ${event.spoke_name} is now ${event.to_status.toUpperCase()} (was ${event.from_status}) at ${event.timestamp}`,
  };
}

/**
 * Sends (or skips) the webhook notification for a transition.
 *
 * The URL saved through the settings API wins over the configured
 * default. Failures and non-OK responses are logged, never thrown.
 */
export async function sendWebhookNotification(
  config: NotificationConfig['webhook'],
  settings: SettingsStore,
  log: Logger,
  event: TransitionEvent,
): Promise<void> {
  if (!config.enabled) {
    log.debug({ event_id: event.event_id }, 'Webhook notification skipped (disabled)');
    return;
  }

  let url: string;
  try {
    url = (await getNotificationSettings(settings)).webhook_url ?? config.url;
  } catch (err: unknown) {
    log.warn({ err, event_id: event.event_id }, 'Could not read webhook setting, using configured default');
    url = config.url;
  }

  if (!url) {
    log.debug({ event_id: event.event_id }, 'Webhook notification skipped (no URL configured)');
    return;
  }

  try {
    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(buildWebhookPayload(event)),
      signal: AbortSignal.timeout(config.timeout_ms),
    });

    if (response.ok) {
      log.info({ event_id: event.event_id, spoke_id: event.spoke_id }, 'Webhook notification sent');
    } else {
      log.warn({ status: response.status, event_id: event.event_id }, 'Webhook returned non-OK status');
    }
  } catch (err: unknown) {
    log.warn({ err, event_id: event.event_id }, 'Failed to send webhook notification');
  }
}
