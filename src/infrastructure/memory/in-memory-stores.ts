import { isTerminal } from '../../domain/index.js';
import type { Command, Spoke, TransitionEvent, User } from '../../domain/index.js';
import type {
  CommandStore,
  CommandUpdate,
  HubStores,
  SettingsStore,
  SpokeStore,
  TransitionQuery,
  TransitionStore,
  UserStore,
} from '../../application/stores.js';

/**
 * Map-backed stores for tests and `STORAGE=memory` development runs.
 * Nothing survives a restart.
 */
export class InMemorySpokeStore implements SpokeStore {
  private readonly rows: Map<string, Spoke> = new Map();

  async loadAll(): Promise<Spoke[]> {
    return [...this.rows.values()].sort((a, b) => a.registered_at.localeCompare(b.registered_at));
  }

  async save(spoke: Spoke): Promise<void> {
    this.rows.set(spoke.id, spoke);
  }

  async delete(spokeId: string): Promise<void> {
    this.rows.delete(spokeId);
  }
}

export class InMemoryCommandStore implements CommandStore {
  private readonly rows: Map<string, Command> = new Map();

  async insert(command: Command): Promise<void> {
    if (this.rows.has(command.command_id)) {
      throw new Error(`Duplicate command ${command.command_id}`);
    }
    this.rows.set(command.command_id, command);
  }

  async update(update: CommandUpdate): Promise<void> {
    const current = this.rows.get(update.command_id);
    if (current === undefined) return;
    this.rows.set(update.command_id, { ...current, ...update });
  }

  async findById(commandId: string): Promise<Command | undefined> {
    return this.rows.get(commandId);
  }

  async listBySpoke(spokeId: string, limit: number): Promise<Command[]> {
    // insertion order is issue order, so reversing gives newest first
    return [...this.rows.values()]
      .filter((c) => c.spoke_id === spokeId)
      .reverse()
      .slice(0, limit);
  }

  async listOpen(): Promise<Command[]> {
    return [...this.rows.values()].filter((c) => !isTerminal(c.state));
  }
}

export class InMemoryUserStore implements UserStore {
  private readonly rows: Map<string, User> = new Map();

  async findByUsername(username: string): Promise<User | undefined> {
    return this.rows.get(username);
  }

  async insert(user: User): Promise<void> {
    if (this.rows.has(user.username)) {
      throw new Error(`Duplicate user ${user.username}`);
    }
    this.rows.set(user.username, user);
  }

  async updatePassword(username: string, passwordHash: string): Promise<boolean> {
    const current = this.rows.get(username);
    if (current === undefined) return false;
    this.rows.set(username, { ...current, password_hash: passwordHash });
    return true;
  }

  async list(): Promise<User[]> {
    return [...this.rows.values()];
  }

  async count(): Promise<number> {
    return this.rows.size;
  }
}

export class InMemorySettingsStore implements SettingsStore {
  private readonly values: Map<string, string> = new Map();

  async get(key: string): Promise<string | undefined> {
    return this.values.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.values.delete(key);
  }
}

export class InMemoryTransitionStore implements TransitionStore {
  private readonly events: TransitionEvent[] = [];

  async insert(event: TransitionEvent): Promise<void> {
    if (this.events.some((e) => e.event_id === event.event_id)) return;
    this.events.push(event);
  }

  async list(query: TransitionQuery): Promise<TransitionEvent[]> {
    return this.events
      .filter((e) => query.spoke_id === undefined || e.spoke_id === query.spoke_id)
      .reverse()
      .slice(query.offset, query.offset + query.limit);
  }
}

export function createInMemoryStores(): HubStores {
  return {
    spokes: new InMemorySpokeStore(),
    commands: new InMemoryCommandStore(),
    users: new InMemoryUserStore(),
    settings: new InMemorySettingsStore(),
    transitions: new InMemoryTransitionStore(),
  };
}
