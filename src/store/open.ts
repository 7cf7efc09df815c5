import type { PlaywiseConfig } from '../core/types.js';
import { InMemoryDataStore } from './memory-store.js';
import { SQLiteDataStore } from './sqlite-store.js';
import type { PolicyDataStore } from './types.js';

/**
 * Pick the store for a configuration: SQLite when a path is set, else memory.
 */
export function openStore(config: Pick<PlaywiseConfig, 'storage'>): PolicyDataStore {
  return config.storage.path ? new SQLiteDataStore(config.storage.path) : new InMemoryDataStore();
}
