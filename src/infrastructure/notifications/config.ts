import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

/**
 * Notification channel configuration loaded from YAML.
 */
export interface NotificationConfig {
  websocket: { enabled: boolean };
  webhook: { enabled: boolean; url: string; timeout_ms: number };
}

/**
 * Default configuration: dashboard broadcast on, webhook on but without
 * a default URL (operators set one through the settings API).
 */
export const DEFAULT_CONFIG: NotificationConfig = {
  websocket: { enabled: true },
  webhook: { enabled: true, url: '', timeout_ms: 5000 },
};

type Scalar = string | number | boolean;

/**
 * Reader for the two-level `section:` / `  key: value` layout of
 * config/notifications.yaml. Only scalars; anything else is ignored.
 */
function parseSectionedYaml(content: string): Map<string, Map<string, Scalar>> {
  const sections: Map<string, Map<string, Scalar>> = new Map();
  let current: Map<string, Scalar> | null = null;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.replace(/\s+#.*$/, '').trimEnd();
    if (line.trim() === '' || line.trimStart().startsWith('#')) continue;

    const colon = line.indexOf(':');
    if (colon === -1) continue;
    const key = line.slice(0, colon).trim();
    const value = line.slice(colon + 1).trim();

    if (!/^\s/.test(line)) {
      current = new Map();
      sections.set(key, current);
      continue;
    }
    if (current === null) continue;

    current.set(key, toScalar(value));
  }

  return sections;
}

function toScalar(value: string): Scalar {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (/^-?\d+(\.\d+)?$/.test(value)) return Number(value);
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  return value;
}

function pickBoolean(section: Map<string, Scalar> | undefined, key: string, fallback: boolean): boolean {
  const value = section?.get(key);
  return typeof value === 'boolean' ? value : fallback;
}

function pickString(section: Map<string, Scalar> | undefined, key: string, fallback: string): string {
  const value = section?.get(key);
  return typeof value === 'string' ? value : fallback;
}

function pickNumber(section: Map<string, Scalar> | undefined, key: string, fallback: number): number {
  const value = section?.get(key);
  return typeof value === 'number' && value > 0 ? value : fallback;
}

/**
 * Loads notification configuration from the YAML file.
 *
 * Falls back to DEFAULT_CONFIG if the file is missing or unreadable.
 * Missing keys take their default values.
 */
export function loadNotificationConfig(
  configPath?: string,
): NotificationConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'notifications.yaml');

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch {
    return structuredClone(DEFAULT_CONFIG);
  }

  const parsed = parseSectionedYaml(content);
  const ws = parsed.get('websocket');
  const webhook = parsed.get('webhook');

  return {
    websocket: {
      enabled: pickBoolean(ws, 'enabled', DEFAULT_CONFIG.websocket.enabled),
    },
    webhook: {
      enabled: pickBoolean(webhook, 'enabled', DEFAULT_CONFIG.webhook.enabled),
      url: pickString(webhook, 'url', DEFAULT_CONFIG.webhook.url),
      timeout_ms: pickNumber(webhook, 'timeout_ms', DEFAULT_CONFIG.webhook.timeout_ms),
    },
  };
}
