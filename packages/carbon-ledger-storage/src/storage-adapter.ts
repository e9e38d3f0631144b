/**
 * Ledger store factory
 *
 * Selects the backend from configuration. Fail-closed: an invalid or
 * incomplete environment throws StoreMisconfiguredError.
 */

import { FileLedgerStore } from './backends/file/ledger';
import { SQLiteLedgerStore } from './backends/sqlite/ledger';
import { StoreConfig, loadStoreConfigFromEnv } from './config';
import { LedgerStore } from './interfaces';

export function createLedgerStore(config: StoreConfig): LedgerStore {
  if (config.backend === 'FILE') {
    return new FileLedgerStore(config.path, { lockTimeoutMs: config.fileLockTimeoutMs });
  } else if (config.backend === 'SQLITE') {
    return new SQLiteLedgerStore({ dbPath: config.path, busyTimeout: config.sqliteBusyTimeoutMs });
  } else {
    const _exhaustive: never = config.backend;
    throw new Error(`Unexpected backend: ${_exhaustive}`);
  }
}

/**
 * Create a LedgerStore from environment configuration.
 *
 * @param env Environment variables (default: process.env)
 */
export function makeLedgerStoreFromEnv(env: NodeJS.ProcessEnv = process.env): LedgerStore {
  return createLedgerStore(loadStoreConfigFromEnv(env));
}
