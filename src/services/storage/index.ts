/**
 * Storage Service Module
 *
 * SQLite state shared across runs: the processed-source ledger and the
 * accepted cards.
 */

export { StateDatabase, StorageError, StorageErrorCode, readSchemaVersion } from './database.js';
export { SqliteLedger, LedgerWriteError } from './ledger.js';
export { AcceptedCardStore } from './accepted-card-store.js';
export type { StoredCard } from './accepted-card-store.js';
export { SCHEMA_VERSION } from './schema.js';
