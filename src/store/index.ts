import type { Environment } from '../config/environment';
import { getPool } from '../config/database';
import type { Clock } from '../utils/clock';
import { InMemoryStore } from './memory.store';
import { PgStore } from './postgres.store';
import type { Store } from './store';

export type { Store, Transaction } from './store';
export { InMemoryStore } from './memory.store';
export { PgStore } from './postgres.store';

/**
 * Build the store selected by STORE_DRIVER
 */
export function createStore(config: Pick<Environment, 'STORE_DRIVER' | 'LOCK_TIMEOUT_MS'>, clock?: Clock): Store {
  if (config.STORE_DRIVER === 'postgres') {
    return new PgStore(getPool(), config.LOCK_TIMEOUT_MS);
  }
  return new InMemoryStore({ clock, lockTimeoutMs: config.LOCK_TIMEOUT_MS });
}
