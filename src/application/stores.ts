// Plain store contracts the application layer works against.
// No Drizzle types here: the Postgres repositories and the in-memory
// stores both implement these.

import type { Command, CommandState, Spoke, TransitionEvent, User } from '../domain/index.js';

export interface SpokeStore {
  /** All spokes, oldest registration first. */
  loadAll(): Promise<Spoke[]>;
  /** Insert or fully replace a spoke row. */
  save(spoke: Spoke): Promise<void>;
  delete(spokeId: string): Promise<void>;
}

export interface CommandUpdate {
  readonly command_id: string;
  readonly state: CommandState;
  readonly result_detail: string | null;
  readonly updated_at: string;
}

export interface CommandStore {
  insert(command: Command): Promise<void>;
  update(update: CommandUpdate): Promise<void>;
  findById(commandId: string): Promise<Command | undefined>;
  /** Newest first. */
  listBySpoke(spokeId: string, limit: number): Promise<Command[]>;
  /** Commands not yet in a terminal state, oldest first. */
  listOpen(): Promise<Command[]>;
}

export interface UserStore {
  findByUsername(username: string): Promise<User | undefined>;
  insert(user: User): Promise<void>;
  updatePassword(username: string, passwordHash: string): Promise<boolean>;
  list(): Promise<User[]>;
  count(): Promise<number>;
}

export interface SettingsStore {
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string): Promise<void>;
  delete(key: string): Promise<void>;
}

export interface TransitionQuery {
  spoke_id?: string;
  limit: number;
  offset: number;
}

export interface TransitionStore {
  insert(event: TransitionEvent): Promise<void>;
  /** Newest first. */
  list(query: TransitionQuery): Promise<TransitionEvent[]>;
}

export interface HubStores {
  readonly spokes: SpokeStore;
  readonly commands: CommandStore;
  readonly users: UserStore;
  readonly settings: SettingsStore;
  readonly transitions: TransitionStore;
}
