import type { SpokeStatus } from './spoke.js';

/**
 * Consecutive-failure thresholds for liveness.
 * `offlineAfter` must be strictly greater than `degradedAfter`.
 */
export interface LivenessThresholds {
  readonly degradedAfter: number;
  readonly offlineAfter: number;
}

export const DEFAULT_THRESHOLDS: LivenessThresholds = {
  degradedAfter: 2,
  offlineAfter: 3,
};

const ALLOWED_TRANSITIONS: Record<SpokeStatus, readonly SpokeStatus[]> = {
  pending: ['online'],
  online: ['degraded', 'offline'],
  degraded: ['online', 'offline'],
  offline: ['online'],
};

export function canTransition(from: SpokeStatus, to: SpokeStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function assertThresholds(thresholds: LivenessThresholds): void {
  if (!Number.isInteger(thresholds.degradedAfter) || thresholds.degradedAfter < 1) {
    throw new RangeError('degradedAfter must be a positive integer');
  }
  if (!Number.isInteger(thresholds.offlineAfter) || thresholds.offlineAfter <= thresholds.degradedAfter) {
    throw new RangeError('offlineAfter must be an integer greater than degradedAfter');
  }
}

export interface LivenessState {
  readonly status: SpokeStatus;
  readonly consecutive_failures: number;
}

/**
 * Folds one heartbeat result into a spoke's liveness state.
 *
 * A success always lands on `online` with the counter reset. A failure
 * bumps the counter; a spoke that has never answered stays `pending`.
 * The function is pure: whether the result is a transition is decided by
 * comparing the returned status with the current one.
 */
export function applyHeartbeat(
  current: LivenessState,
  reachable: boolean,
  thresholds: LivenessThresholds,
): LivenessState {
  if (reachable) {
    return { status: 'online', consecutive_failures: 0 };
  }

  const failures = current.consecutive_failures + 1;

  if (current.status === 'pending') {
    return { status: 'pending', consecutive_failures: failures };
  }
  if (failures >= thresholds.offlineAfter) {
    return { status: 'offline', consecutive_failures: failures };
  }
  if (failures >= thresholds.degradedAfter) {
    return {
      status: current.status === 'offline' ? 'offline' : 'degraded',
      consecutive_failures: failures,
    };
  }
  return { status: current.status, consecutive_failures: failures };
}
