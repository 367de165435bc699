export const DEFAULT_SPOKE_PORT = 49950;

/**
 * Base HTTP URL of a spoke agent from its registered address.
 * `10.0.0.5` and `10.0.0.5:49950` both become `http://10.0.0.5:49950`;
 * explicit http(s) URLs are kept as given, minus a trailing slash.
 */
export function spokeBaseUrl(address: string): string {
  const trimmed = address.trim().replace(/\/+$/, '');
  if (/^https?:\/\//i.test(trimmed)) return trimmed;
  const hasPort = /:\d+$/.test(trimmed) && (!trimmed.includes('::') || trimmed.startsWith('['));
  return `http://${trimmed}${hasPort ? '' : `:${DEFAULT_SPOKE_PORT}`}`;
}

/** WebSocket URL of a path on the spoke agent (`http` → `ws`, `https` → `wss`). */
export function spokeWsUrl(address: string, path: string): string {
  return `${spokeBaseUrl(address).replace(/^http/i, 'ws')}${path}`;
}

/** Agent log stream path; `replay=0` skips the console tail a fresh connection starts with. */
export function logStreamPath(replay: boolean): string {
  return replay ? '/logs' : '/logs?replay=0';
}
