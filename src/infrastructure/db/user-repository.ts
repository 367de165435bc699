import { asc, count, eq } from 'drizzle-orm';
import type { User } from '../../domain/index.js';
import type { UserStore } from '../../application/stores.js';
import type { Database } from './client.js';
import { users } from './schema.js';

type UserRow = typeof users.$inferSelect;

function toUser(row: UserRow): User {
  return { ...row, created_at: row.created_at.toISOString() };
}

export class PgUserStore implements UserStore {
  constructor(private readonly db: Database) {}

  async findByUsername(username: string): Promise<User | undefined> {
    const rows = await this.db.select().from(users).where(eq(users.username, username)).limit(1);
    const row = rows[0];
    return row === undefined ? undefined : toUser(row);
  }

  async insert(user: User): Promise<void> {
    await this.db.insert(users).values({ ...user, created_at: new Date(user.created_at) });
  }

  async updatePassword(username: string, passwordHash: string): Promise<boolean> {
    const rows = await this.db
      .update(users)
      .set({ password_hash: passwordHash })
      .where(eq(users.username, username))
      .returning({ username: users.username });
    return rows.length > 0;
  }

  async list(): Promise<User[]> {
    const rows = await this.db.select().from(users).orderBy(asc(users.created_at));
    return rows.map(toUser);
  }

  async count(): Promise<number> {
    const [row] = await this.db.select({ value: count() }).from(users);
    return row?.value ?? 0;
  }
}
