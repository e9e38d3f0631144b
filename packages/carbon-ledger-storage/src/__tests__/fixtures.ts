import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { FieldMap, LedgerRecord, canonicalize, computeRecordHash, generateSalt } from 'carbon-ledger-core';

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * A correctly chained record following `previous` (or a genesis record).
 */
export function buildRecord(
  partition: string,
  previous: LedgerRecord | null,
  payload: FieldMap,
  createdAt = '2024-03-01T10:00:00.000Z',
  supersedes: string | null = null
): LedgerRecord {
  const salt = generateSalt();
  const previousHash = previous ? previous.recordHash : null;
  return {
    id: uuidv4(),
    partition,
    sequence: previous ? previous.sequence + 1 : 1,
    payload,
    salt,
    previousHash,
    recordHash: computeRecordHash(canonicalize(payload), salt, previousHash),
    supersedes,
    createdAt
  };
}
