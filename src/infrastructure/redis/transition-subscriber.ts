import { Redis } from 'ioredis';
import { z } from 'zod';
import type { Logger } from 'pino';
import { SPOKE_STATUSES } from '../../domain/index.js';
import type { TransitionEvent } from '../../domain/index.js';
import { TRANSITION_CHANNEL } from './transition-notifier.js';

export type TransitionHandler = (event: TransitionEvent) => void;

const transitionEventSchema = z.object({
  event_id: z.string().uuid(),
  spoke_id: z.string().uuid(),
  spoke_name: z.string(),
  from_status: z.enum(SPOKE_STATUSES),
  to_status: z.enum(SPOKE_STATUSES),
  timestamp: z.string().datetime(),
});

/** Parses one channel message; null for anything that is not a transition event. */
export function parseTransitionMessage(message: string): TransitionEvent | null {
  let raw: unknown;
  try {
    raw = JSON.parse(message);
  } catch {
    return null;
  }
  const parsed = transitionEventSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Subscribes to "spoke_transitions" on a dedicated connection (ioredis
 * needs one for subscriber mode) and hands each valid event to `handler`.
 * Malformed payloads are logged and skipped.
 *
 * Returns a cleanup function for graceful shutdown.
 */
export async function startTransitionSubscriber(
  redisUrl: string,
  log: Logger,
  handler: TransitionHandler,
): Promise<() => Promise<void>> {
  const sub = new Redis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  await sub.connect();

  sub.on('message', (channel: string, message: string) => {
    if (channel !== TRANSITION_CHANNEL) return;

    const event = parseTransitionMessage(message);
    if (event === null) {
      log.warn({ message }, 'Malformed spoke transition payload, skipping');
      return;
    }

    try {
      handler(event);
    } catch (err: unknown) {
      log.warn({ err, event_id: event.event_id }, 'Transition handler failed');
    }
  });

  await sub.subscribe(TRANSITION_CHANNEL);
  log.info({ channel: TRANSITION_CHANNEL }, 'Subscribed to spoke transitions');

  return async () => {
    try {
      await sub.unsubscribe(TRANSITION_CHANNEL);
      await sub.quit();
    } catch (err: unknown) {
      log.warn({ err }, 'Error while closing transition subscriber');
    }
    log.info('Transition subscriber disconnected');
  };
}
