import type { Logger } from 'pino';
import type { TransitionEvent } from '../domain/index.js';

export type TransitionSink = (event: TransitionEvent) => Promise<void>;

export interface TransitionQueueOptions {
  sink: TransitionSink;
  log: Logger;
  /** Events held while the sink is behind; the oldest is dropped past this. */
  capacity?: number;
}

/**
 * In-process hand-off between the heartbeat monitor and whatever records
 * and publishes transitions.
 *
 * `push` never waits on the sink. A single consumer drains the queue in
 * order, one event at a time, so a stalled sink only grows the queue.
 */
export class TransitionQueue {
  private readonly pending: TransitionEvent[] = [];
  private readonly waiters: Array<() => void> = [];
  private readonly capacity: number;
  private draining = false;
  private dropped = 0;

  constructor(private readonly opts: TransitionQueueOptions) {
    this.capacity = opts.capacity ?? 1000;
  }

  push(event: TransitionEvent): void {
    this.pending.push(event);
    if (this.pending.length > this.capacity) {
      const lost = this.pending.shift();
      this.dropped++;
      this.opts.log.warn(
        { event_id: lost?.event_id, dropped: this.dropped, capacity: this.capacity },
        'Transition queue full, dropped oldest event',
      );
    }
    if (!this.draining) {
      this.draining = true;
      void this.drain();
    }
  }

  get size(): number {
    return this.pending.length;
  }

  /** Resolves once every queued event has been through the sink. */
  idle(): Promise<void> {
    if (!this.draining) return Promise.resolve();
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  private async drain(): Promise<void> {
    let event = this.pending.shift();
    while (event !== undefined) {
      try {
        await this.opts.sink(event);
      } catch (err: unknown) {
        this.opts.log.warn({ err, spoke_id: event.spoke_id, event_id: event.event_id }, 'Transition sink failed');
      }
      event = this.pending.shift();
    }
    this.draining = false;
    for (const resolve of this.waiters.splice(0)) resolve();
  }
}
