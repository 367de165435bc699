import type { BaseLogger } from 'pino';
import type { SqlClient } from './client.js';

const STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS spokes (
    id                   UUID PRIMARY KEY,
    name                 VARCHAR(64)  NOT NULL,
    address              VARCHAR(255) NOT NULL,
    api_key_hash         VARCHAR(255) NOT NULL,
    api_key_sealed       TEXT         NOT NULL,
    allowed_source_ip    VARCHAR(64),
    status               VARCHAR(16)  NOT NULL,
    last_seen            TIMESTAMPTZ,
    consecutive_failures INTEGER      NOT NULL DEFAULT 0,
    registered_at        TIMESTAMPTZ  NOT NULL,
    last_metrics         JSONB
  )`,
  `CREATE TABLE IF NOT EXISTS commands (
    command_id      UUID PRIMARY KEY,
    spoke_id        UUID         NOT NULL,
    verb            VARCHAR(16)  NOT NULL,
    action          VARCHAR(32)  NOT NULL,
    target_instance VARCHAR(64)  NOT NULL,
    issued_by       VARCHAR(64)  NOT NULL,
    issued_at       TIMESTAMPTZ  NOT NULL,
    updated_at      TIMESTAMPTZ  NOT NULL,
    state           VARCHAR(16)  NOT NULL,
    result_detail   TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS users (
    username      VARCHAR(64)  PRIMARY KEY,
    password_hash VARCHAR(255) NOT NULL,
    role          VARCHAR(16)  NOT NULL,
    created_at    TIMESTAMPTZ  NOT NULL DEFAULT NOW()
  )`,
  `CREATE TABLE IF NOT EXISTS settings (
    key        VARCHAR(128) PRIMARY KEY,
    value      TEXT         NOT NULL,
    updated_at TIMESTAMPTZ  NOT NULL DEFAULT NOW()
  )`,
  `CREATE TABLE IF NOT EXISTS transitions (
    event_id    UUID PRIMARY KEY,
    spoke_id    UUID        NOT NULL,
    spoke_name  VARCHAR(64) NOT NULL,
    from_status VARCHAR(16) NOT NULL,
    to_status   VARCHAR(16) NOT NULL,
    timestamp   TIMESTAMPTZ NOT NULL
  )`,
  `CREATE UNIQUE INDEX IF NOT EXISTS uq_spokes_name_address ON spokes (name, address)`,
  `CREATE INDEX IF NOT EXISTS idx_spokes_registered_at ON spokes (registered_at)`,
  `CREATE INDEX IF NOT EXISTS idx_commands_spoke_id_issued_at ON commands (spoke_id, issued_at)`,
  `CREATE INDEX IF NOT EXISTS idx_transitions_spoke_id ON transitions (spoke_id)`,
  `CREATE INDEX IF NOT EXISTS idx_transitions_timestamp ON transitions (timestamp)`,
];

/** Idempotent table bootstrap, run once at hub startup. */
export async function ensureSchema(sql: SqlClient, log: BaseLogger): Promise<void> {
  for (const statement of STATEMENTS) {
    await sql.unsafe(statement);
  }
  log.info('Database schema ensured');
}
