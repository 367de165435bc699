/**
 * Core domain types for the spoke fleet.
 *
 * These types describe a managed host as the hub sees it. They carry no
 * framework dependencies.
 */

export const SPOKE_STATUSES = ['pending', 'online', 'degraded', 'offline'] as const;

export type SpokeStatus = (typeof SPOKE_STATUSES)[number];

/** Host utilisation reported by a spoke, all values in percent. */
export interface SpokeMetrics {
  readonly cpu_percent: number;
  readonly ram_percent: number;
  readonly disk_percent: number;
}

/**
 * Canonical Spoke record.
 *
 * `api_key_hash` verifies spoke-originated calls; `api_key_sealed` is the
 * same key encrypted under the hub secret so the hub can authenticate its
 * own calls to the spoke. Neither is ever exposed over the API.
 */
export interface Spoke {
  readonly id: string;
  readonly name: string;
  readonly address: string;
  readonly api_key_hash: string;
  readonly api_key_sealed: string;
  readonly allowed_source_ip: string | null;
  readonly status: SpokeStatus;
  readonly last_seen: string | null; // ISO-8601
  readonly consecutive_failures: number;
  readonly registered_at: string; // ISO-8601
  readonly last_metrics: SpokeMetrics | null;
}

/** Spoke shape returned to dashboard clients. */
export type PublicSpoke = Omit<Spoke, 'api_key_hash' | 'api_key_sealed'>;

export function toPublicSpoke(spoke: Spoke): PublicSpoke {
  const { api_key_hash: _hash, api_key_sealed: _sealed, ...rest } = spoke;
  return rest;
}

/**
 * Result of one heartbeat poll. Ephemeral: folded into the Spoke record
 * and a short in-memory history.
 */
export interface HeartbeatSample {
  readonly spoke_id: string;
  readonly timestamp: string; // ISO-8601
  readonly reachable: boolean;
  readonly metrics: SpokeMetrics | null;
  readonly sessions: readonly string[];
  readonly error?: string;
}

/** Emitted exactly once per actual status change of a spoke. */
export interface TransitionEvent {
  readonly event_id: string;
  readonly spoke_id: string;
  readonly spoke_name: string;
  readonly from_status: SpokeStatus;
  readonly to_status: SpokeStatus;
  readonly timestamp: string; // ISO-8601
}
