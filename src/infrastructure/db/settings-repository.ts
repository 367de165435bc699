import { eq } from 'drizzle-orm';
import type { SettingsStore } from '../../application/stores.js';
import type { Database } from './client.js';
import { settings } from './schema.js';

export class PgSettingsStore implements SettingsStore {
  constructor(private readonly db: Database) {}

  async get(key: string): Promise<string | undefined> {
    const rows = await this.db.select().from(settings).where(eq(settings.key, key)).limit(1);
    return rows[0]?.value;
  }

  async set(key: string, value: string): Promise<void> {
    const updated_at = new Date();
    await this.db
      .insert(settings)
      .values({ key, value, updated_at })
      .onConflictDoUpdate({ target: settings.key, set: { value, updated_at } });
  }

  async delete(key: string): Promise<void> {
    await this.db.delete(settings).where(eq(settings.key, key));
  }
}
