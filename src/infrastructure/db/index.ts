export { spokes, commands, users, settings, transitions } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, SqlClient } from './client.js';
export { ensureSchema } from './ensure-schema.js';
export { createDbStores } from './db-stores.js';
export { PgSpokeStore } from './spoke-repository.js';
export { PgCommandStore } from './command-repository.js';
export { PgUserStore } from './user-repository.js';
export { PgSettingsStore } from './settings-repository.js';
export { PgTransitionStore } from './transition-repository.js';
export { default as dbPlugin } from './db-plugin.js';
