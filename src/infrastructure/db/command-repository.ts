import { asc, desc, eq, inArray } from 'drizzle-orm';
import type { Command } from '../../domain/index.js';
import type { CommandStore, CommandUpdate } from '../../application/stores.js';
import type { Database } from './client.js';
import { commands } from './schema.js';

type CommandRow = typeof commands.$inferSelect;

function toCommand(row: CommandRow): Command {
  return {
    ...row,
    issued_at: row.issued_at.toISOString(),
    updated_at: row.updated_at.toISOString(),
  };
}

export class PgCommandStore implements CommandStore {
  constructor(private readonly db: Database) {}

  async insert(command: Command): Promise<void> {
    await this.db.insert(commands).values({
      ...command,
      issued_at: new Date(command.issued_at),
      updated_at: new Date(command.updated_at),
    });
  }

  async update(update: CommandUpdate): Promise<void> {
    await this.db
      .update(commands)
      .set({
        state: update.state,
        result_detail: update.result_detail,
        updated_at: new Date(update.updated_at),
      })
      .where(eq(commands.command_id, update.command_id));
  }

  async findById(commandId: string): Promise<Command | undefined> {
    const rows = await this.db.select().from(commands).where(eq(commands.command_id, commandId)).limit(1);
    const row = rows[0];
    return row === undefined ? undefined : toCommand(row);
  }

  async listBySpoke(spokeId: string, limit: number): Promise<Command[]> {
    const rows = await this.db
      .select()
      .from(commands)
      .where(eq(commands.spoke_id, spokeId))
      .orderBy(desc(commands.issued_at))
      .limit(limit);
    return rows.map(toCommand);
  }

  async listOpen(): Promise<Command[]> {
    const rows = await this.db
      .select()
      .from(commands)
      .where(inArray(commands.state, ['queued', 'sent', 'acknowledged']))
      .orderBy(asc(commands.issued_at));
    return rows.map(toCommand);
  }
}
