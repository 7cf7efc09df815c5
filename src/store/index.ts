export type { PolicyDataStore } from './types.js';
export { InMemoryDataStore } from './memory-store.js';
export { SQLiteDataStore } from './sqlite-store.js';
export { openStore } from './open.js';
