/**
 * Carbon Ledger Storage
 *
 * Backends:
 * - FileLedgerStore: JSONL per partition, lock file for writers
 * - SQLiteLedgerStore: SQLite with WAL and append-only triggers (recommended)
 */

export * from './interfaces';
export * from './config';
export * from './storage-adapter';
export { FileLedgerStore, FileLedgerStoreOptions } from './backends/file/ledger';
export { SQLiteLedgerStore, SQLiteLedgerStoreConfig } from './backends/sqlite/ledger';
export { acquireLock, withLock, FileLockOptions } from './backends/file/lock';
