import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { ControlPlaneError, canAdvance, isTerminal } from '../domain/index.js';
import type {
  Command,
  CommandState,
  CommandVerb,
  Principal,
  Role,
  Spoke,
} from '../domain/index.js';
import type { CommandStore } from './stores.js';
import type { FleetRegistry } from './fleet-registry.js';
import { KeyedMutex } from './keyed-mutex.js';

export type TransportResult = { ok: true } | { ok: false; detail: string };

export interface CommandTransport {
  /**
   * Delivers a command to the spoke agent. Resolves with the spoke's
   * verdict on a response; rejects on network errors and when `signal`
   * aborts.
   */
  send(spoke: Spoke, command: Command, signal: AbortSignal): Promise<TransportResult>;
}

export type VerbPolicy = Record<Role, readonly CommandVerb[]>;

export const DEFAULT_VERB_POLICY: VerbPolicy = {
  admin: ['start', 'stop', 'restart', 'update', 'custom'],
  operator: ['start', 'stop', 'restart'],
  viewer: [],
};

export const INSTANCE_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,63}$/;
export const ACTION_PATTERN = /^[a-z][a-z0-9-]{0,31}$/;

export interface DispatchRequest {
  spokeId: string;
  verb: CommandVerb;
  targetInstance: string;
  action?: string | undefined;
  issuer: Principal;
}

export interface CompletionReport {
  succeeded: boolean;
  detail?: string | null | undefined;
}

export interface CommandDispatcherOptions {
  registry: FleetRegistry;
  store: CommandStore;
  transport: CommandTransport;
  log: Logger;
  ackTimeoutMs: number;
  completionTimeoutMs: number;
  allowDegradedDispatch: boolean;
  verbPolicy?: VerbPolicy;
  nowFn?: () => number;
}

interface SpokeLane {
  /** Command currently in `sent`, if any. */
  active: string | null;
  queue: string[];
}

/**
 * Issues control commands to spokes and tracks them to a terminal state.
 *
 * Commands for one spoke go out strictly one at a time in issue order:
 * the next queued command is transmitted only once the current one has
 * left `sent`. Different spokes never wait on each other.
 */
export class CommandDispatcher {
  private readonly lanes: Map<string, SpokeLane> = new Map();
  /** Non-terminal commands; terminal ones live only in the store. */
  private readonly open: Map<string, Command> = new Map();
  private readonly transmissions: Map<string, AbortController> = new Map();
  private readonly completionTimers: Map<string, NodeJS.Timeout> = new Map();
  private readonly spokeMutex = new KeyedMutex();
  private readonly commandMutex = new KeyedMutex();
  private readonly opts: CommandDispatcherOptions;
  private readonly policy: VerbPolicy;
  private readonly nowFn: () => number;

  constructor(options: CommandDispatcherOptions) {
    this.opts = options;
    this.policy = options.verbPolicy ?? DEFAULT_VERB_POLICY;
    this.nowFn = options.nowFn ?? Date.now;
  }

  async dispatch(request: DispatchRequest): Promise<Command> {
    const { spokeId, verb, issuer } = request;

    if (!this.policy[issuer.role].includes(verb)) {
      throw new ControlPlaneError('Unauthorized', `Role ${issuer.role} may not issue ${verb}`);
    }

    this.assertDispatchable(this.opts.registry.get(spokeId));
    const action = resolveAction(verb, request.targetInstance, request.action);

    return this.spokeMutex.runExclusive(spokeId, async () => {
      // re-checked under the lane lock: removal may have raced us
      const spoke = this.opts.registry.get(spokeId);
      this.assertDispatchable(spoke);

      const lane = this.lanes.get(spokeId) ?? { active: null, queue: [] };
      const now = new Date(this.nowFn()).toISOString();
      const command: Command = {
        command_id: randomUUID(),
        spoke_id: spokeId,
        verb,
        action,
        target_instance: request.targetInstance,
        issued_by: issuer.username,
        issued_at: now,
        updated_at: now,
        state: lane.active === null ? 'sent' : 'queued',
        result_detail: null,
      };

      try {
        await this.opts.store.insert(command);
      } catch (err: unknown) {
        this.opts.log.error({ err, spoke_id: spokeId }, 'Failed to persist command');
        throw new ControlPlaneError('InternalFault', 'Failed to persist command', { cause: err });
      }

      this.open.set(command.command_id, command);
      this.lanes.set(spokeId, lane);
      this.opts.log.info(
        { command_id: command.command_id, spoke_id: spokeId, verb, action, state: command.state, issued_by: issuer.username },
        'Command issued',
      );

      if (lane.active === null) {
        lane.active = command.command_id;
        this.startTransmission(spoke, command);
      } else {
        lane.queue.push(command.command_id);
      }
      return command;
    });
  }

  /**
   * Settles commands a previous hub process left open. Queued rows were
   * never transmitted and nobody waits on the ack of a `sent` row any more.
   * An acknowledged command can still be reported by its spoke, so it gets
   * a completion timer for whatever time it has left.
   */
  async recover(): Promise<{ failed: number; timedOut: number; resumed: number }> {
    let stored: Command[];
    try {
      stored = await this.opts.store.listOpen();
    } catch (err: unknown) {
      this.opts.log.error({ err }, 'Failed to load open commands');
      throw new ControlPlaneError('InternalFault', 'Failed to load open commands', { cause: err });
    }

    const counts = { failed: 0, timedOut: 0, resumed: 0 };
    for (const command of stored) {
      const id = command.command_id;
      if (this.open.has(id)) continue;

      if (this.opts.registry.find(command.spoke_id) === undefined) {
        if ((await this.advance(id, 'failed', 'spoke removed')) !== null) counts.failed++;
      } else if (command.state === 'queued') {
        if ((await this.advance(id, 'failed', 'hub restarted before the command was sent')) !== null) counts.failed++;
      } else if (command.state === 'sent') {
        if ((await this.advance(id, 'timed_out', 'hub restarted before the spoke acknowledged')) !== null) {
          counts.timedOut++;
        }
      } else if (command.state === 'acknowledged') {
        this.open.set(id, command);
        const elapsed = this.nowFn() - Date.parse(command.updated_at);
        this.armCompletionTimer(id, Math.max(0, this.opts.completionTimeoutMs - elapsed));
        counts.resumed++;
      }
    }

    if (stored.length > 0) {
      this.opts.log.info(counts, 'Recovered open commands');
    }
    return counts;
  }

  /** Completion callback from the spoke that ran the command. */
  async reportResult(spokeId: string, commandId: string, report: CompletionReport): Promise<Command> {
    const current = await this.get(commandId);
    if (current.spoke_id !== spokeId) {
      throw new ControlPlaneError('NotFound', `Command ${commandId} not found`);
    }
    if (isTerminal(current.state)) {
      throw new ControlPlaneError('Conflict', `Command ${commandId} is already ${current.state}`);
    }
    if (current.state === 'queued') {
      throw new ControlPlaneError('Conflict', `Command ${commandId} has not been sent yet`);
    }

    const detail = report.detail ?? null;
    if (current.state === 'sent') {
      await this.advance(commandId, 'acknowledged', null);
    }

    const final = await this.advance(commandId, report.succeeded ? 'succeeded' : 'failed', detail);
    if (final === null) {
      const latest = await this.get(commandId);
      throw new ControlPlaneError('Conflict', `Command ${commandId} is already ${latest.state}`);
    }
    return final;
  }

  async get(commandId: string): Promise<Command> {
    const cached = this.open.get(commandId);
    if (cached !== undefined) return cached;

    const stored = await this.opts.store.findById(commandId);
    if (stored === undefined) {
      throw new ControlPlaneError('NotFound', `Command ${commandId} not found`);
    }
    return stored;
  }

  /** Newest first. */
  async listForSpoke(spokeId: string, limit = 50): Promise<Command[]> {
    return this.opts.store.listBySpoke(spokeId, limit);
  }

  /** Fails every open command of a removed spoke and aborts its transmission. */
  async cancelForSpoke(spokeId: string): Promise<number> {
    const ids = await this.spokeMutex.runExclusive(spokeId, async () => {
      this.lanes.delete(spokeId);
      return [...this.open.values()]
        .filter((c) => c.spoke_id === spokeId)
        .map((c) => c.command_id);
    });

    let cancelled = 0;
    for (const commandId of ids) {
      const updated = await this.advance(commandId, 'failed', 'spoke removed');
      if (updated !== null) cancelled++;
      this.transmissions.get(commandId)?.abort(new Error('spoke removed'));
    }

    if (cancelled > 0) {
      this.opts.log.info({ spoke_id: spokeId, cancelled }, 'Open commands cancelled');
    }
    return cancelled;
  }

  stop(): void {
    for (const controller of this.transmissions.values()) controller.abort(new Error('dispatcher stopped'));
    for (const timer of this.completionTimers.values()) clearTimeout(timer);
    this.transmissions.clear();
    this.completionTimers.clear();
  }

  get openCount(): number {
    return this.open.size;
  }

  private assertDispatchable(spoke: Spoke): void {
    if (spoke.status === 'online') return;
    if (spoke.status === 'degraded' && this.opts.allowDegradedDispatch) return;
    throw new ControlPlaneError('SpokeUnreachable', `Spoke ${spoke.name} is ${spoke.status}`);
  }

  private startTransmission(spoke: Spoke, command: Command): void {
    void this.transmit(spoke, command)
      .catch((err: unknown) => {
        this.opts.log.error({ err, command_id: command.command_id }, 'Command transmission crashed');
      })
      .then(() => this.advanceLane(spoke.id))
      .catch((err: unknown) => {
        this.opts.log.error({ err, spoke_id: spoke.id }, 'Failed to advance command lane');
      });
  }

  private async transmit(spoke: Spoke, command: Command): Promise<void> {
    const controller = new AbortController();
    this.transmissions.set(command.command_id, controller);
    const timeout = setTimeout(
      () => controller.abort(new Error(`no acknowledgement within ${this.opts.ackTimeoutMs}ms`)),
      this.opts.ackTimeoutMs,
    );

    let next: CommandState;
    let detail: string | null = null;
    try {
      const result = await this.opts.transport.send(spoke, command, controller.signal);
      if (result.ok) {
        next = 'acknowledged';
      } else {
        next = 'failed';
        detail = result.detail;
      }
    } catch (err: unknown) {
      const reason = controller.signal.aborted ? controller.signal.reason : err;
      next = 'timed_out';
      detail = reason instanceof Error ? reason.message : String(reason);
    } finally {
      clearTimeout(timeout);
      this.transmissions.delete(command.command_id);
    }

    const updated = await this.advance(command.command_id, next, detail);
    if (updated?.state === 'acknowledged') {
      this.armCompletionTimer(command.command_id);
    }
  }

  private async advanceLane(spokeId: string): Promise<void> {
    await this.spokeMutex.runExclusive(spokeId, async () => {
      const lane = this.lanes.get(spokeId);
      if (lane === undefined) return;
      lane.active = null;

      while (lane.queue.length > 0) {
        const nextId = lane.queue.shift();
        if (nextId === undefined) break;
        let sent: Command | null;
        try {
          sent = await this.advance(nextId, 'sent', null);
        } catch (err: unknown) {
          this.opts.log.error({ err, spoke_id: spokeId, command_id: nextId }, 'Could not send queued command');
          const stranded = [nextId, ...lane.queue.splice(0)];
          this.lanes.delete(spokeId);
          await this.failStranded(stranded);
          return;
        }
        if (sent === null) continue;

        const spoke = this.opts.registry.find(spokeId);
        if (spoke === undefined) {
          await this.advance(nextId, 'failed', 'spoke removed');
          continue;
        }
        lane.active = nextId;
        this.startTransmission(spoke, sent);
        return;
      }

      this.lanes.delete(spokeId);
    });
  }

  private async failStranded(commandIds: string[]): Promise<void> {
    for (const commandId of commandIds) {
      try {
        await this.advance(commandId, 'failed', 'hub could not record the command as sent');
      } catch (err: unknown) {
        this.opts.log.error({ err, command_id: commandId }, 'Failed to fail stranded command');
      }
    }
  }

  private armCompletionTimer(commandId: string, delayMs = this.opts.completionTimeoutMs): void {
    const timer = setTimeout(() => {
      this.completionTimers.delete(commandId);
      void this.advance(commandId, 'timed_out', 'no completion report received').catch((err: unknown) => {
        this.opts.log.error({ err, command_id: commandId }, 'Failed to time out command');
      });
    }, delayMs);
    timer.unref();
    this.completionTimers.set(commandId, timer);
  }

  /**
   * Moves a command forward. Returns null when the move is not allowed
   * from its current state; the stored record is left alone.
   */
  private async advance(commandId: string, to: CommandState, detail: string | null): Promise<Command | null> {
    return this.commandMutex.runExclusive(commandId, async () => {
      const current = this.open.get(commandId) ?? (await this.opts.store.findById(commandId));
      if (current === undefined || !canAdvance(current.state, to)) return null;

      const updated: Command = {
        ...current,
        state: to,
        result_detail: detail ?? current.result_detail,
        updated_at: new Date(this.nowFn()).toISOString(),
      };

      try {
        await this.opts.store.update({
          command_id: commandId,
          state: updated.state,
          result_detail: updated.result_detail,
          updated_at: updated.updated_at,
        });
      } catch (err: unknown) {
        this.opts.log.error({ err, command_id: commandId }, 'Failed to persist command state');
        throw new ControlPlaneError('InternalFault', 'Failed to persist command state', { cause: err });
      }

      if (isTerminal(to)) {
        this.open.delete(commandId);
        const timer = this.completionTimers.get(commandId);
        if (timer !== undefined) {
          clearTimeout(timer);
          this.completionTimers.delete(commandId);
        }
      } else {
        this.open.set(commandId, updated);
      }

      this.opts.log.info(
        { command_id: commandId, spoke_id: updated.spoke_id, from: current.state, to, detail: updated.result_detail },
        'Command state changed',
      );
      return updated;
    });
  }
}

function resolveAction(verb: CommandVerb, instance: string, action: string | undefined): string {
  if (!INSTANCE_PATTERN.test(instance)) {
    throw new ControlPlaneError('ValidationError', `Invalid instance name: ${instance}`);
  }
  if (verb !== 'custom') {
    if (action !== undefined && action !== verb) {
      throw new ControlPlaneError('ValidationError', 'Action is only accepted for custom commands');
    }
    return verb;
  }
  if (action === undefined || !ACTION_PATTERN.test(action)) {
    throw new ControlPlaneError('ValidationError', 'Custom commands need an action matching [a-z][a-z0-9-]*');
  }
  return action;
}
