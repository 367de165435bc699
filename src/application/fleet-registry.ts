import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import {
  ControlPlaneError,
  applyHeartbeat,
  canTransition,
} from '../domain/index.js';
import type {
  HeartbeatSample,
  LivenessThresholds,
  Spoke,
  SpokeStatus,
  TransitionEvent,
} from '../domain/index.js';
import type { SpokeStore } from './stores.js';
import { KeyedMutex } from './keyed-mutex.js';
import { hashSecret, sealSecret, unsealSecret } from './secrets.js';

/** Registration input from the provisioning flow. */
export interface SpokeDescriptor {
  name: string;
  address: string;
  api_key: string;
  allowed_source_ip?: string | null | undefined;
}

export interface RegistrationResult {
  spoke: Spoke;
  created: boolean;
}

export type SpokeHook = (spoke: Spoke) => void | Promise<void>;

export interface FleetRegistryOptions {
  store: SpokeStore;
  /** Key used to seal spoke API keys at rest. */
  sealKey: Buffer;
  log: Logger;
  nowFn?: () => number;
}

/**
 * Authoritative table of known spokes.
 *
 * Records live in an in-memory map (insertion order = registration
 * order) mirrored to the SpokeStore. Every mutation of one spoke runs
 * under that spoke's key in a KeyedMutex, so heartbeat, registration and
 * removal never interleave on the same record while different spokes
 * proceed independently.
 *
 * A store failure leaves the in-memory record untouched and surfaces as
 * InternalFault.
 */
export class FleetRegistry {
  private readonly spokes: Map<string, Spoke> = new Map();
  private readonly mutex = new KeyedMutex();
  private readonly registeredHooks: SpokeHook[] = [];
  private readonly removedHooks: SpokeHook[] = [];
  private readonly store: SpokeStore;
  private readonly sealKey: Buffer;
  private readonly log: Logger;
  private readonly nowFn: () => number;

  constructor(options: FleetRegistryOptions) {
    this.store = options.store;
    this.sealKey = options.sealKey;
    this.log = options.log;
    this.nowFn = options.nowFn ?? Date.now;
  }

  /** Loads persisted spokes. Call once before serving traffic. */
  async hydrate(): Promise<number> {
    const rows = await this.store.loadAll();
    for (const row of rows) {
      this.spokes.set(row.id, row);
    }
    this.log.info({ spokeCount: rows.length }, 'Fleet registry hydrated');
    return rows.length;
  }

  onRegistered(hook: SpokeHook): void {
    this.registeredHooks.push(hook);
  }

  onRemoved(hook: SpokeHook): void {
    this.removedHooks.push(hook);
  }

  /**
   * Registers a spoke, idempotent by (name, address): a repeat updates the
   * key material and allowlist of the existing record and keeps its id.
   * A different name at an already registered address is a Conflict.
   */
  async register(descriptor: SpokeDescriptor): Promise<RegistrationResult> {
    const address = descriptor.address.trim();
    const name = descriptor.name.trim();

    const result = await this.mutex.runExclusive(`address:${address}`, async () => {
      const sameAddress = [...this.spokes.values()].filter((s) => s.address === address);
      const existing = sameAddress.find((s) => s.name === name);

      if (existing === undefined && sameAddress.length > 0) {
        throw new ControlPlaneError('Conflict', `Address ${address} is already registered to another spoke`);
      }

      const apiKeyHash = await hashSecret(descriptor.api_key);
      const apiKeySealed = sealSecret(descriptor.api_key, this.sealKey);
      const allowedSourceIp = descriptor.allowed_source_ip ?? null;

      if (existing !== undefined) {
        return this.mutex.runExclusive(existing.id, async () => {
          const current = this.spokes.get(existing.id) ?? existing;
          const updated: Spoke = {
            ...current,
            api_key_hash: apiKeyHash,
            api_key_sealed: apiKeySealed,
            allowed_source_ip: allowedSourceIp,
          };
          await this.persist(updated);
          this.spokes.set(updated.id, updated);
          return { spoke: updated, created: false };
        });
      }

      const spoke: Spoke = {
        id: randomUUID(),
        name,
        address,
        api_key_hash: apiKeyHash,
        api_key_sealed: apiKeySealed,
        allowed_source_ip: allowedSourceIp,
        status: 'pending',
        last_seen: null,
        consecutive_failures: 0,
        registered_at: new Date(this.nowFn()).toISOString(),
        last_metrics: null,
      };
      await this.persist(spoke);
      this.spokes.set(spoke.id, spoke);
      return { spoke, created: true };
    });

    if (result.created) {
      this.log.info({ spoke_id: result.spoke.id, name, address }, 'Spoke registered');
      await this.runHooks(this.registeredHooks, result.spoke, 'registration');
    } else {
      this.log.info({ spoke_id: result.spoke.id, name, address }, 'Spoke re-registered, credentials updated');
    }

    if (result.spoke.allowed_source_ip === null) {
      this.log.warn(
        { spoke_id: result.spoke.id },
        'Spoke registered without a source IP allowlist; restricting it is strongly recommended',
      );
    }

    return result;
  }

  get(spokeId: string): Spoke {
    const spoke = this.spokes.get(spokeId);
    if (spoke === undefined) {
      throw new ControlPlaneError('NotFound', `Spoke ${spokeId} not found`);
    }
    return spoke;
  }

  find(spokeId: string): Spoke | undefined {
    return this.spokes.get(spokeId);
  }

  /** Registration order. */
  list(): Spoke[] {
    return [...this.spokes.values()];
  }

  /** Plaintext API key of a spoke, for authenticating hub-to-spoke calls. */
  revealApiKey(spoke: Spoke): string {
    return unsealSecret(spoke.api_key_sealed, this.sealKey);
  }

  /**
   * Moves a spoke to `status` if the transition graph allows it.
   * Redundant or out-of-order transitions are no-ops and return null.
   */
  async updateStatus(spokeId: string, status: SpokeStatus): Promise<TransitionEvent | null> {
    return this.mutex.runExclusive(spokeId, async () => {
      const current = this.spokes.get(spokeId);
      if (current === undefined || !canTransition(current.status, status)) {
        return null;
      }
      const next: Spoke = { ...current, status };
      await this.persist(next);
      this.spokes.set(spokeId, next);
      return this.transition(current, next);
    });
  }

  /**
   * Folds a heartbeat result into the spoke's record and returns the
   * resulting transition, if any. Unknown (removed) spokes return null.
   */
  async recordHeartbeat(
    sample: HeartbeatSample,
    thresholds: LivenessThresholds,
  ): Promise<TransitionEvent | null> {
    return this.mutex.runExclusive(sample.spoke_id, async () => {
      const current = this.spokes.get(sample.spoke_id);
      if (current === undefined) return null;

      const liveness = applyHeartbeat(current, sample.reachable, thresholds);
      const changed = liveness.status !== current.status && canTransition(current.status, liveness.status);

      const next: Spoke = {
        ...current,
        status: changed ? liveness.status : current.status,
        consecutive_failures: liveness.consecutive_failures,
        last_seen: sample.reachable ? sample.timestamp : current.last_seen,
        last_metrics: sample.reachable ? sample.metrics : current.last_metrics,
      };

      await this.persist(next);
      this.spokes.set(next.id, next);

      return changed ? this.transition(current, next) : null;
    });
  }

  /**
   * Deletes a spoke. The only path to deletion; removal hooks cancel the
   * spoke's heartbeat task, in-flight commands and log streams.
   */
  async remove(spokeId: string): Promise<Spoke> {
    const removed = await this.mutex.runExclusive(spokeId, async () => {
      const current = this.get(spokeId);
      try {
        await this.store.delete(spokeId);
      } catch (err: unknown) {
        this.log.error({ err, spoke_id: spokeId }, 'Failed to delete spoke');
        throw new ControlPlaneError('InternalFault', 'Failed to delete spoke', { cause: err });
      }
      this.spokes.delete(spokeId);
      return current;
    });

    this.log.info({ spoke_id: spokeId, name: removed.name }, 'Spoke removed');
    await this.runHooks(this.removedHooks, removed, 'removal');
    return removed;
  }

  get size(): number {
    return this.spokes.size;
  }

  private transition(from: Spoke, to: Spoke): TransitionEvent {
    return {
      event_id: randomUUID(),
      spoke_id: to.id,
      spoke_name: to.name,
      from_status: from.status,
      to_status: to.status,
      timestamp: new Date(this.nowFn()).toISOString(),
    };
  }

  private async persist(spoke: Spoke): Promise<void> {
    try {
      await this.store.save(spoke);
    } catch (err: unknown) {
      this.log.error({ err, spoke_id: spoke.id }, 'Failed to persist spoke');
      throw new ControlPlaneError('InternalFault', 'Failed to persist spoke', { cause: err });
    }
  }

  private async runHooks(hooks: readonly SpokeHook[], spoke: Spoke, phase: string): Promise<void> {
    for (const hook of hooks) {
      try {
        await hook(spoke);
      } catch (err: unknown) {
        this.log.error({ err, spoke_id: spoke.id, phase }, 'Spoke lifecycle hook failed');
      }
    }
  }
}
