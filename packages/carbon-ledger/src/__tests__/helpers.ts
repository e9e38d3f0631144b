import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import Database from 'better-sqlite3';
import { FieldMap, canonicalString } from 'carbon-ledger-core';
import { FileLedgerStore, LedgerStore, SQLiteLedgerStore, StoreBackend } from 'carbon-ledger-storage';
import { CarbonLedger, CarbonLedgerOptions } from '../ledger';

export const BACKENDS: StoreBackend[] = ['FILE', 'SQLITE'];

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Clock the test moves by hand.
 */
export class ManualClock {
  private current: number;

  constructor(iso: string) {
    this.current = Date.parse(iso);
  }

  now = (): Date => new Date(this.current);

  set(iso: string): void {
    this.current = Date.parse(iso);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export function openStore(backend: StoreBackend, dir: string): LedgerStore {
  return backend === 'FILE'
    ? new FileLedgerStore(dir)
    : new SQLiteLedgerStore({ dbPath: path.join(dir, 'ledger.db') });
}

export async function openLedger(
  backend: StoreBackend,
  dir: string,
  options: Omit<CarbonLedgerOptions, 'store'> = {}
): Promise<CarbonLedger> {
  const ledger = new CarbonLedger({ store: openStore(backend, dir), ...options });
  await ledger.initialize();
  return ledger;
}

export interface StoredChanges {
  payload?: FieldMap;
  payloadText?: string; // written verbatim, even if it is not canonical
  recordHash?: string;
  previousHash?: string | null;
  supersedes?: string | null;
}

function storedColumns(changes: StoredChanges): Record<string, string | null> {
  const columns: Record<string, string | null> = {};
  if (changes.payload !== undefined) columns.payload_json = canonicalString(changes.payload);
  if (changes.payloadText !== undefined) columns.payload_json = changes.payloadText;
  if (changes.recordHash !== undefined) columns.record_hash = changes.recordHash;
  if (changes.previousHash !== undefined) columns.previous_hash = changes.previousHash;
  if (changes.supersedes !== undefined) columns.supersedes = changes.supersedes;
  return columns;
}

function rewriteRecordLine(
  dir: string,
  partition: string,
  recordId: string,
  rewrite: (row: object) => object | null
): void {
  const recordsPath = path.join(dir, 'partitions', partition, 'records.jsonl');
  const lines = fs.readFileSync(recordsPath, 'utf-8').split('\n').filter(line => line.length > 0);
  const output: string[] = [];
  for (const line of lines) {
    const row: unknown = JSON.parse(line);
    if (typeof row !== 'object' || row === null) throw new Error(`unexpected line: ${line}`);
    if (!('id' in row) || row.id !== recordId) {
      output.push(line);
      continue;
    }
    const replaced = rewrite(row);
    if (replaced) output.push(JSON.stringify(replaced));
  }
  fs.writeFileSync(recordsPath, output.map(line => line + '\n').join(''));
}

function withRawDatabase(dir: string, fn: (db: Database.Database) => void): void {
  const db = new Database(path.join(dir, 'ledger.db'));
  try {
    fn(db);
  } finally {
    db.close();
  }
}

/**
 * Change stored fields of a record behind the ledger's back, the way an
 * attacker with storage access would.
 */
export function tamperRecord(
  backend: StoreBackend,
  dir: string,
  partition: string,
  recordId: string,
  changes: StoredChanges
): void {
  const columns = storedColumns(changes);
  if (backend === 'FILE') {
    rewriteRecordLine(dir, partition, recordId, row => ({ ...row, ...columns }));
    return;
  }

  withRawDatabase(dir, db => {
    db.exec('DROP TRIGGER IF EXISTS prevent_record_update');
    for (const [column, value] of Object.entries(columns)) {
      db.prepare(`UPDATE ledger_records SET ${column} = ? WHERE id = ?`).run(value, recordId);
    }
  });
}

export function deleteRecord(backend: StoreBackend, dir: string, partition: string, recordId: string): void {
  if (backend === 'FILE') {
    rewriteRecordLine(dir, partition, recordId, () => null);
    return;
  }

  withRawDatabase(dir, db => {
    db.exec('DROP TRIGGER IF EXISTS prevent_record_delete');
    db.prepare('DELETE FROM ledger_records WHERE id = ?').run(recordId);
  });
}
