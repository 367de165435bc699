import type { Logger } from 'pino';
import { assertThresholds } from '../domain/index.js';
import type {
  HeartbeatSample,
  LivenessThresholds,
  Spoke,
  SpokeMetrics,
  TransitionEvent,
} from '../domain/index.js';
import type { FleetRegistry } from './fleet-registry.js';
import type { ConcurrencyLimiter } from './concurrency-limiter.js';
import { TransitionQueue } from './transition-queue.js';
import type { TransitionSink } from './transition-queue.js';

/** What a spoke answers on `/status`. */
export interface SpokeStatusReport {
  sessions: string[];
  metrics: SpokeMetrics | null;
}

export interface SpokeProbe {
  /** Rejects when the spoke is unreachable, answers non-2xx, or `signal` aborts. */
  probe(spoke: Spoke, signal: AbortSignal): Promise<SpokeStatusReport>;
}

export interface HeartbeatMonitorOptions {
  registry: FleetRegistry;
  probe: SpokeProbe;
  sink: TransitionSink;
  limiter: ConcurrencyLimiter;
  log: Logger;
  intervalMs: number;
  timeoutMs: number;
  jitterMs: number;
  thresholds: LivenessThresholds;
  historySize?: number;
  /** Transitions held while the sink is behind. */
  queueCapacity?: number;
  nowFn?: () => number;
  randomFn?: () => number;
}

interface PollTask {
  timer: NodeJS.Timeout | null;
  inFlight: AbortController | null;
  cancelled: boolean;
}

/**
 * Polls every registered spoke on its own timer.
 *
 * Each spoke has one task: poll, fold the result into the registry,
 * queue any transition for the sink, then schedule the next poll after
 * the interval plus random jitter. Polls never wait on the sink. Tasks never share state, so a slow
 * spoke delays nothing but itself; outbound calls still go through the
 * shared concurrency limiter.
 */
export class HeartbeatMonitor {
  private readonly tasks: Map<string, PollTask> = new Map();
  private readonly history: Map<string, HeartbeatSample[]> = new Map();
  private readonly opts: HeartbeatMonitorOptions;
  private readonly historySize: number;
  private readonly nowFn: () => number;
  private readonly randomFn: () => number;
  private readonly transitions: TransitionQueue;
  private running = false;

  constructor(options: HeartbeatMonitorOptions) {
    assertThresholds(options.thresholds);
    if (options.timeoutMs >= options.intervalMs) {
      throw new RangeError('Heartbeat timeout must be shorter than the heartbeat interval');
    }
    this.opts = options;
    this.historySize = options.historySize ?? 60;
    this.nowFn = options.nowFn ?? Date.now;
    this.randomFn = options.randomFn ?? Math.random;
    this.transitions = new TransitionQueue({
      sink: options.sink,
      log: options.log,
      capacity: options.queueCapacity,
    });
  }

  /** Starts a task for every spoke currently in the registry. */
  start(): void {
    if (this.running) return;
    this.running = true;
    for (const spoke of this.opts.registry.list()) {
      this.track(spoke.id);
    }
    this.opts.log.info(
      { spokes: this.tasks.size, intervalMs: this.opts.intervalMs },
      'Heartbeat monitor started',
    );
  }

  /** Begins polling a spoke; the first poll runs right away. */
  track(spokeId: string): void {
    if (!this.running || this.tasks.has(spokeId)) return;
    const task: PollTask = { timer: null, inFlight: null, cancelled: false };
    this.tasks.set(spokeId, task);
    this.schedule(spokeId, task, 0);
  }

  /** Stops polling a spoke and aborts its in-flight probe. */
  untrack(spokeId: string): void {
    const task = this.tasks.get(spokeId);
    this.history.delete(spokeId);
    if (task === undefined) return;

    task.cancelled = true;
    if (task.timer !== null) clearTimeout(task.timer);
    task.inFlight?.abort(new Error('spoke removed'));
    this.tasks.delete(spokeId);
  }

  stop(): void {
    for (const spokeId of [...this.tasks.keys()]) {
      this.untrack(spokeId);
    }
    this.running = false;
    this.opts.log.info('Heartbeat monitor stopped');
  }

  isTracking(spokeId: string): boolean {
    return this.tasks.has(spokeId);
  }

  /** Resolves once queued transitions have reached the sink. */
  flushTransitions(): Promise<void> {
    return this.transitions.idle();
  }

  /** Newest last. */
  recentSamples(spokeId: string): HeartbeatSample[] {
    return [...(this.history.get(spokeId) ?? [])];
  }

  /**
   * Runs one poll of one spoke and records it. Returns the sample and the
   * transition it caused, or null when the spoke is no longer registered.
   */
  async pollOnce(
    spokeId: string,
    signal?: AbortSignal,
  ): Promise<{ sample: HeartbeatSample; transition: TransitionEvent | null } | null> {
    const spoke = this.opts.registry.find(spokeId);
    if (spoke === undefined) return null;

    const sample = await this.opts.limiter.run(() => this.probe(spoke, signal));
    if (signal?.aborted) return null;

    let transition: TransitionEvent | null = null;
    try {
      transition = await this.opts.registry.recordHeartbeat(sample, this.opts.thresholds);
    } catch (err: unknown) {
      this.opts.log.error({ err, spoke_id: spokeId }, 'Failed to record heartbeat');
      return { sample, transition: null };
    }

    if (this.opts.registry.find(spokeId) !== undefined) {
      this.remember(sample);
    }

    if (transition !== null) {
      this.opts.log.info(
        { spoke_id: spokeId, from: transition.from_status, to: transition.to_status },
        'Spoke status changed',
      );
      this.transitions.push(transition);
    }

    return { sample, transition };
  }

  private async probe(spoke: Spoke, outer: AbortSignal | undefined): Promise<HeartbeatSample> {
    const controller = new AbortController();
    const onOuterAbort = (): void => controller.abort(outer?.reason);
    outer?.addEventListener('abort', onOuterAbort, { once: true });
    const timeout = setTimeout(
      () => controller.abort(new Error(`heartbeat timed out after ${this.opts.timeoutMs}ms`)),
      this.opts.timeoutMs,
    );

    const timestamp = new Date(this.nowFn()).toISOString();
    try {
      const report = await this.opts.probe.probe(spoke, controller.signal);
      return {
        spoke_id: spoke.id,
        timestamp,
        reachable: true,
        metrics: report.metrics,
        sessions: report.sessions,
      };
    } catch (err: unknown) {
      const reason = controller.signal.aborted ? controller.signal.reason : err;
      const message = reason instanceof Error ? reason.message : String(reason);
      this.opts.log.debug({ spoke_id: spoke.id, err: reason }, 'Heartbeat failed');
      return {
        spoke_id: spoke.id,
        timestamp,
        reachable: false,
        metrics: null,
        sessions: [],
        error: message,
      };
    } finally {
      clearTimeout(timeout);
      outer?.removeEventListener('abort', onOuterAbort);
    }
  }

  private schedule(spokeId: string, task: PollTask, delayMs: number): void {
    task.timer = setTimeout(() => {
      task.timer = null;
      void this.tick(spokeId, task);
    }, delayMs);
  }

  private async tick(spokeId: string, task: PollTask): Promise<void> {
    if (task.cancelled) return;

    const controller = new AbortController();
    task.inFlight = controller;
    try {
      await this.pollOnce(spokeId, controller.signal);
    } catch (err: unknown) {
      this.opts.log.error({ err, spoke_id: spokeId }, 'Heartbeat poll crashed');
    } finally {
      task.inFlight = null;
    }

    if (task.cancelled) return;
    const jitter = Math.floor(this.randomFn() * this.opts.jitterMs);
    this.schedule(spokeId, task, this.opts.intervalMs + jitter);
  }

  private remember(sample: HeartbeatSample): void {
    const ring = this.history.get(sample.spoke_id) ?? [];
    ring.push(sample);
    if (ring.length > this.historySize) ring.splice(0, ring.length - this.historySize);
    this.history.set(sample.spoke_id, ring);
  }
}
