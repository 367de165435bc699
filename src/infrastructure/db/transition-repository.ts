import { desc, eq } from 'drizzle-orm';
import type { TransitionEvent } from '../../domain/index.js';
import type { TransitionQuery, TransitionStore } from '../../application/stores.js';
import type { Database } from './client.js';
import { transitions } from './schema.js';

export class PgTransitionStore implements TransitionStore {
  constructor(private readonly db: Database) {}

  /** Idempotent on event_id, so a redelivered event is stored once. */
  async insert(event: TransitionEvent): Promise<void> {
    await this.db
      .insert(transitions)
      .values({ ...event, timestamp: new Date(event.timestamp) })
      .onConflictDoNothing({ target: transitions.event_id });
  }

  async list(query: TransitionQuery): Promise<TransitionEvent[]> {
    const rows = await this.db
      .select()
      .from(transitions)
      .where(query.spoke_id === undefined ? undefined : eq(transitions.spoke_id, query.spoke_id))
      .orderBy(desc(transitions.timestamp))
      .limit(query.limit)
      .offset(query.offset);
    return rows.map((row) => ({ ...row, timestamp: row.timestamp.toISOString() }));
  }
}
