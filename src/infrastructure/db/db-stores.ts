import type { HubStores } from '../../application/stores.js';
import type { Database } from './client.js';
import { PgSpokeStore } from './spoke-repository.js';
import { PgCommandStore } from './command-repository.js';
import { PgUserStore } from './user-repository.js';
import { PgSettingsStore } from './settings-repository.js';
import { PgTransitionStore } from './transition-repository.js';

export function createDbStores(db: Database): HubStores {
  return {
    spokes: new PgSpokeStore(db),
    commands: new PgCommandStore(db),
    users: new PgUserStore(db),
    settings: new PgSettingsStore(db),
    transitions: new PgTransitionStore(db),
  };
}
