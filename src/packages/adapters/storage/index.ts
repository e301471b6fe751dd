/**
 * SQLite storage adapters
 *
 * @module packages/adapters/storage
 */

export { SqliteCheckpointStore } from './SqliteCheckpointStore.js';
export { SqliteLedgerStore } from './SqliteLedgerStore.js';
export { SqliteIdentityStore } from './SqliteIdentityStore.js';
export { SqliteCommunityRegistry } from './SqliteCommunityRegistry.js';
