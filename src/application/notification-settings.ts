import type { SettingsStore } from './stores.js';

export const WEBHOOK_URL_SETTING = 'notification.webhook_url';

export interface NotificationSettings {
  webhook_url: string | null;
}

export async function getNotificationSettings(store: SettingsStore): Promise<NotificationSettings> {
  return { webhook_url: (await store.get(WEBHOOK_URL_SETTING)) ?? null };
}

export async function updateNotificationSettings(
  store: SettingsStore,
  settings: NotificationSettings,
): Promise<NotificationSettings> {
  if (settings.webhook_url === null) {
    await store.delete(WEBHOOK_URL_SETTING);
  } else {
    await store.set(WEBHOOK_URL_SETTING, settings.webhook_url);
  }
  return settings;
}
