import { pgTable, uuid, varchar, text, integer, timestamp, jsonb, index, uniqueIndex } from 'drizzle-orm/pg-core';
import { COMMAND_STATES, COMMAND_VERBS, ROLES, SPOKE_STATUSES } from '../../domain/index.js';
import type { SpokeMetrics } from '../../domain/index.js';

/**
 * Registered spokes. `(name, address)` is the natural identity used by
 * idempotent re-registration; `id` is what everything else references.
 */
export const spokes = pgTable('spokes', {
  id: uuid('id').primaryKey(),
  name: varchar('name', { length: 64 }).notNull(),
  address: varchar('address', { length: 255 }).notNull(),
  api_key_hash: varchar('api_key_hash', { length: 255 }).notNull(),
  api_key_sealed: text('api_key_sealed').notNull(),
  allowed_source_ip: varchar('allowed_source_ip', { length: 64 }),
  status: varchar('status', { length: 16, enum: SPOKE_STATUSES }).notNull(),
  last_seen: timestamp('last_seen', { withTimezone: true }),
  consecutive_failures: integer('consecutive_failures').notNull().default(0),
  registered_at: timestamp('registered_at', { withTimezone: true }).notNull(),
  last_metrics: jsonb('last_metrics').$type<SpokeMetrics>(),
}, (table) => [
  uniqueIndex('uq_spokes_name_address').on(table.name, table.address),
  index('idx_spokes_registered_at').on(table.registered_at),
]);

/** Command history. Rows are never deleted when their spoke is removed. */
export const commands = pgTable('commands', {
  command_id: uuid('command_id').primaryKey(),
  spoke_id: uuid('spoke_id').notNull(),
  verb: varchar('verb', { length: 16, enum: COMMAND_VERBS }).notNull(),
  action: varchar('action', { length: 32 }).notNull(),
  target_instance: varchar('target_instance', { length: 64 }).notNull(),
  issued_by: varchar('issued_by', { length: 64 }).notNull(),
  issued_at: timestamp('issued_at', { withTimezone: true }).notNull(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull(),
  state: varchar('state', { length: 16, enum: COMMAND_STATES }).notNull(),
  result_detail: text('result_detail'),
}, (table) => [
  index('idx_commands_spoke_id_issued_at').on(table.spoke_id, table.issued_at),
]);

export const users = pgTable('users', {
  username: varchar('username', { length: 64 }).primaryKey(),
  password_hash: varchar('password_hash', { length: 255 }).notNull(),
  role: varchar('role', { length: 16, enum: ROLES }).notNull(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

export const settings = pgTable('settings', {
  key: varchar('key', { length: 128 }).primaryKey(),
  value: text('value').notNull(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

export const transitions = pgTable('transitions', {
  event_id: uuid('event_id').primaryKey(),
  spoke_id: uuid('spoke_id').notNull(),
  spoke_name: varchar('spoke_name', { length: 64 }).notNull(),
  from_status: varchar('from_status', { length: 16, enum: SPOKE_STATUSES }).notNull(),
  to_status: varchar('to_status', { length: 16, enum: SPOKE_STATUSES }).notNull(),
  timestamp: timestamp('timestamp', { withTimezone: true }).notNull(),
}, (table) => [
  index('idx_transitions_spoke_id').on(table.spoke_id),
  index('idx_transitions_timestamp').on(table.timestamp),
]);
