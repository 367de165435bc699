import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { TransitionEvent } from '../../domain/index.js';

export const TRANSITION_CHANNEL = 'spoke_transitions';

/**
 * Publishes a transition event on the "spoke_transitions" Pub/Sub channel.
 *
 * Best-effort: publish failures are logged but never stop heartbeat
 * polling. The event is already in transition history at this point.
 */
export async function publishTransition(
  redis: Redis,
  log: Logger,
  event: TransitionEvent,
): Promise<void> {
  try {
    const receivers = await redis.publish(TRANSITION_CHANNEL, JSON.stringify(event));
    log.debug(
      { channel: TRANSITION_CHANNEL, event_id: event.event_id, spoke_id: event.spoke_id, receivers },
      'Published spoke transition',
    );
  } catch (err: unknown) {
    log.warn({ err, event_id: event.event_id }, 'Failed to publish spoke transition');
  }
}
