import type { Logger } from 'pino';
import { ControlPlaneError } from '../domain/index.js';
import type { Principal, Role, User } from '../domain/index.js';
import type { UserStore } from './stores.js';
import { hashSecret } from './secrets.js';

export type PublicUser = Omit<User, 'password_hash'>;

export function toPublicUser(user: User): PublicUser {
  const { password_hash: _hash, ...rest } = user;
  return rest;
}

export async function createUser(
  store: UserStore,
  input: { username: string; password: string; role: Role },
  nowFn: () => number = Date.now,
): Promise<PublicUser> {
  if (await store.findByUsername(input.username)) {
    throw new ControlPlaneError('Conflict', `User ${input.username} already exists`);
  }
  const user: User = {
    username: input.username,
    password_hash: await hashSecret(input.password),
    role: input.role,
    created_at: new Date(nowFn()).toISOString(),
  };
  await store.insert(user);
  return toPublicUser(user);
}

/** Admins may reset anyone's password; everyone else only their own. */
export async function changePassword(
  store: UserStore,
  actor: Principal,
  username: string,
  password: string,
): Promise<void> {
  if (actor.role !== 'admin' && actor.username !== username) {
    throw new ControlPlaneError('Unauthorized', 'Only admins can change other users\' passwords');
  }
  const updated = await store.updatePassword(username, await hashSecret(password));
  if (!updated) {
    throw new ControlPlaneError('NotFound', `User ${username} not found`);
  }
}

/**
 * Creates the first admin account on an empty user table.
 * Returns true when an account was created.
 */
export async function ensureBootstrapAdmin(
  store: UserStore,
  password: string | null,
  log: Logger,
): Promise<boolean> {
  if ((await store.count()) > 0) return false;

  if (password === null) {
    log.warn('No users exist and BOOTSTRAP_ADMIN_PASSWORD is unset; nobody can log in yet');
    return false;
  }

  await createUser(store, { username: 'admin', password, role: 'admin' });
  log.info({ username: 'admin' }, 'Bootstrap admin account created');
  return true;
}
