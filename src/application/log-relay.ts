import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { Spoke } from '../domain/index.js';

export type LogDelivery =
  | { type: 'line'; spoke_id: string; instance: string; line: string }
  | { type: 'gap'; spoke_id: string; skipped: number }
  | { type: 'notice'; spoke_id: string; message: string };

/** A dashboard-side consumer. `send` may be slow; the relay never waits on it upstream. */
export interface LogSubscriber {
  send(item: LogDelivery): Promise<void> | void;
  close(reason: string): void;
}

export interface LogUpstreamHandlers {
  onLine(instance: string, line: string): void;
  /** Called once when the connection ends for any reason other than `close()`. */
  onClose(reason: string): void;
}

export interface LogUpstream {
  close(): void;
}

export interface LogUpstreamOptions {
  /** Ask the agent to start with its recent console lines. Off on reconnect. */
  replay: boolean;
}

export interface LogUpstreamConnector {
  open(spoke: Spoke, handlers: LogUpstreamHandlers, options: LogUpstreamOptions): LogUpstream;
}

export interface SubscriptionHandle {
  readonly id: string;
  readonly spokeId: string;
}

export interface LogRelayOptions {
  connector: LogUpstreamConnector;
  resolveSpoke: (spokeId: string) => Spoke;
  log: Logger;
  replayLines?: number;
  bufferSize?: number;
  reconnectDelayMs?: number;
}

interface Subscription {
  handle: SubscriptionHandle;
  subscriber: LogSubscriber;
  instance: string | null;
  queue: LogDelivery[];
  dropped: number;
  draining: boolean;
  closed: boolean;
}

interface SpokeStream {
  upstream: LogUpstream | null;
  subscriptions: Map<string, Subscription>;
  replay: Array<{ instance: string; line: string }>;
  reconnectTimer: NodeJS.Timeout | null;
}

/**
 * Fans one upstream log connection per spoke out to any number of
 * dashboard subscribers.
 *
 * Each subscriber has its own bounded queue drained independently; when
 * it overflows the oldest line is dropped and a `gap` item with the
 * skipped count precedes the next delivery. A reconnect asks the agent
 * for no replay, so subscribers never see the same tail twice.
 */
export class LogRelay {
  private readonly streams: Map<string, SpokeStream> = new Map();
  private readonly opts: LogRelayOptions;
  private readonly replayLines: number;
  private readonly bufferSize: number;
  private readonly reconnectDelayMs: number;

  constructor(options: LogRelayOptions) {
    this.opts = options;
    this.replayLines = options.replayLines ?? 100;
    this.bufferSize = options.bufferSize ?? 500;
    this.reconnectDelayMs = options.reconnectDelayMs ?? 5_000;
  }

  /** Throws NotFound (from `resolveSpoke`) for unknown spokes. */
  subscribe(spokeId: string, subscriber: LogSubscriber, filter: { instance?: string | undefined } = {}): SubscriptionHandle {
    const spoke = this.opts.resolveSpoke(spokeId);
    const stream = this.streams.get(spokeId) ?? this.createStream(spokeId);

    const subscription: Subscription = {
      handle: { id: randomUUID(), spokeId },
      subscriber,
      instance: filter.instance ?? null,
      queue: [],
      dropped: 0,
      draining: false,
      closed: false,
    };
    stream.subscriptions.set(subscription.handle.id, subscription);

    for (const entry of stream.replay) {
      if (subscription.instance === null || subscription.instance === entry.instance) {
        this.enqueue(subscription, { type: 'line', spoke_id: spokeId, ...entry });
      }
    }

    if (stream.upstream === null && stream.reconnectTimer === null) {
      this.connect(spoke, stream, true);
    }

    this.opts.log.debug(
      { spoke_id: spokeId, subscription_id: subscription.handle.id, subscribers: stream.subscriptions.size },
      'Log subscriber added',
    );
    return subscription.handle;
  }

  /** Closing the last subscriber of a spoke closes its upstream. */
  unsubscribe(handle: SubscriptionHandle): void {
    const stream = this.streams.get(handle.spokeId);
    const subscription = stream?.subscriptions.get(handle.id);
    if (stream === undefined || subscription === undefined) return;

    subscription.closed = true;
    subscription.queue = [];
    stream.subscriptions.delete(handle.id);

    if (stream.subscriptions.size === 0) {
      this.teardown(handle.spokeId, stream);
    }
  }

  /** Spoke removal: closes the upstream and ends every subscription. */
  closeSpoke(spokeId: string): void {
    const stream = this.streams.get(spokeId);
    if (stream === undefined) return;

    for (const subscription of stream.subscriptions.values()) {
      subscription.closed = true;
      subscription.queue = [];
      try {
        subscription.subscriber.close('spoke removed');
      } catch (err: unknown) {
        this.opts.log.warn({ err, spoke_id: spokeId }, 'Failed to close log subscriber');
      }
    }
    stream.subscriptions.clear();
    this.teardown(spokeId, stream);
  }

  stop(): void {
    for (const spokeId of [...this.streams.keys()]) {
      this.closeSpoke(spokeId);
    }
  }

  hasUpstream(spokeId: string): boolean {
    return (this.streams.get(spokeId)?.upstream ?? null) !== null;
  }

  stats(): { upstreams: number; subscriptions: number } {
    let upstreams = 0;
    let subscriptions = 0;
    for (const stream of this.streams.values()) {
      if (stream.upstream !== null) upstreams++;
      subscriptions += stream.subscriptions.size;
    }
    return { upstreams, subscriptions };
  }

  private createStream(spokeId: string): SpokeStream {
    const stream: SpokeStream = {
      upstream: null,
      subscriptions: new Map(),
      replay: [],
      reconnectTimer: null,
    };
    this.streams.set(spokeId, stream);
    return stream;
  }

  private connect(spoke: Spoke, stream: SpokeStream, replay: boolean): void {
    let current: LogUpstream | null = null;
    const handlers: LogUpstreamHandlers = {
      onLine: (instance, line) => {
        if (stream.upstream !== current) return;
        this.fanOut(spoke.id, stream, instance, line);
      },
      onClose: (reason) => {
        if (stream.upstream !== current) return;
        stream.upstream = null;
        this.handleUpstreamClosed(spoke.id, stream, reason);
      },
    };

    try {
      current = this.opts.connector.open(spoke, handlers, { replay });
    } catch (err: unknown) {
      this.opts.log.warn({ err, spoke_id: spoke.id }, 'Failed to open log upstream');
      this.handleUpstreamClosed(spoke.id, stream, err instanceof Error ? err.message : String(err));
      return;
    }
    stream.upstream = current;
    this.opts.log.info({ spoke_id: spoke.id, replay }, 'Log upstream opened');
  }

  private handleUpstreamClosed(spokeId: string, stream: SpokeStream, reason: string): void {
    if (this.streams.get(spokeId) !== stream || stream.subscriptions.size === 0) return;

    this.opts.log.warn({ spoke_id: spokeId, reason }, 'Log upstream closed, reconnecting');
    this.broadcast(stream, {
      type: 'notice',
      spoke_id: spokeId,
      message: `log stream interrupted (${reason}); reconnecting`,
    });

    stream.reconnectTimer = setTimeout(() => {
      stream.reconnectTimer = null;
      if (this.streams.get(spokeId) !== stream || stream.subscriptions.size === 0) return;
      try {
        this.connect(this.opts.resolveSpoke(spokeId), stream, false);
      } catch (err: unknown) {
        this.opts.log.warn({ err, spoke_id: spokeId }, 'Log upstream reconnect abandoned');
        this.closeSpoke(spokeId);
      }
    }, this.reconnectDelayMs);
  }

  private fanOut(spokeId: string, stream: SpokeStream, instance: string, line: string): void {
    stream.replay.push({ instance, line });
    if (stream.replay.length > this.replayLines) stream.replay.shift();

    for (const subscription of stream.subscriptions.values()) {
      if (subscription.instance === null || subscription.instance === instance) {
        this.enqueue(subscription, { type: 'line', spoke_id: spokeId, instance, line });
      }
    }
  }

  private broadcast(stream: SpokeStream, item: LogDelivery): void {
    for (const subscription of stream.subscriptions.values()) {
      this.enqueue(subscription, item);
    }
  }

  private enqueue(subscription: Subscription, item: LogDelivery): void {
    if (subscription.closed) return;
    subscription.queue.push(item);
    if (subscription.queue.length > this.bufferSize) {
      subscription.queue.shift();
      subscription.dropped++;
    }
    if (!subscription.draining) {
      // deliveries start on a later tick, never inside the caller's stack
      subscription.draining = true;
      void Promise.resolve().then(() => this.drain(subscription));
    }
  }

  private async drain(subscription: Subscription): Promise<void> {
    try {
      while (!subscription.closed && subscription.queue.length > 0) {
        if (subscription.dropped > 0) {
          const skipped = subscription.dropped;
          subscription.dropped = 0;
          await subscription.subscriber.send({ type: 'gap', spoke_id: subscription.handle.spokeId, skipped });
          continue;
        }
        const item = subscription.queue.shift();
        if (item === undefined) break;
        await subscription.subscriber.send(item);
      }
    } catch (err: unknown) {
      this.opts.log.warn({ err, spoke_id: subscription.handle.spokeId }, 'Log subscriber send failed, dropping subscriber');
      this.unsubscribe(subscription.handle);
    } finally {
      subscription.draining = false;
    }
  }

  private teardown(spokeId: string, stream: SpokeStream): void {
    if (stream.reconnectTimer !== null) {
      clearTimeout(stream.reconnectTimer);
      stream.reconnectTimer = null;
    }
    const upstream = stream.upstream;
    stream.upstream = null;
    this.streams.delete(spokeId);
    if (upstream !== null) {
      upstream.close();
      this.opts.log.info({ spoke_id: spokeId }, 'Log upstream closed');
    }
  }
}
