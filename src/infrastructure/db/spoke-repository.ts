import { asc, eq } from 'drizzle-orm';
import type { Spoke } from '../../domain/index.js';
import type { SpokeStore } from '../../application/stores.js';
import type { Database } from './client.js';
import { spokes } from './schema.js';

type SpokeRow = typeof spokes.$inferSelect;

function toSpoke(row: SpokeRow): Spoke {
  return {
    ...row,
    last_seen: row.last_seen?.toISOString() ?? null,
    registered_at: row.registered_at.toISOString(),
  };
}

export class PgSpokeStore implements SpokeStore {
  constructor(private readonly db: Database) {}

  async loadAll(): Promise<Spoke[]> {
    const rows = await this.db.select().from(spokes).orderBy(asc(spokes.registered_at));
    return rows.map(toSpoke);
  }

  async save(spoke: Spoke): Promise<void> {
    const values = {
      ...spoke,
      last_seen: spoke.last_seen === null ? null : new Date(spoke.last_seen),
      registered_at: new Date(spoke.registered_at),
    };
    const { id: _id, ...changes } = values;
    await this.db
      .insert(spokes)
      .values(values)
      .onConflictDoUpdate({ target: spokes.id, set: changes });
  }

  async delete(spokeId: string): Promise<void> {
    await this.db.delete(spokes).where(eq(spokes.id, spokeId));
  }
}
