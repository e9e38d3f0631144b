/**
 * Verifier
 *
 * Read-only checks that prove or disprove that stored records are the
 * ones originally written:
 * - record: recompute the hash from payload, salt and link, and match the
 *   supersedes column against the hashed `__supersedes` field
 * - chain: walk a sequence range and check continuity, links, uniqueness
 *   hashes and supersedes links, stopping at the first finding
 * - anchor: recompute a period's Merkle root over the stored hashes
 *
 * Findings come back as values. assertVerified() turns a failed result
 * into a TamperDetectedError for callers that prefer exceptions.
 */

import {
  AnchorNotFoundError,
  HashInputError,
  LedgerRecord,
  PayloadValidationError,
  RecordNotFoundError,
  TamperDetected,
  TamperDetectedError,
  TamperReason,
  VerificationResult,
  assertPartition,
  assertPeriod,
  canonicalize,
  computeMerkleRoot,
  computeRecordHash,
  createLogger,
  shortHash
} from 'carbon-ledger-core';
import { LedgerStore } from 'carbon-ledger-storage';
import { recordsInPeriod } from './anchorer';
import { SUPERSEDES_FIELD } from './chain-builder';

const logger = createLogger('verifier');

export interface PeriodAudit {
  partition: string;
  period: string;
  ok: boolean;
  anchor: VerificationResult;
  chain: VerificationResult;
}

/**
 * Hash the stored fields of `record` again. Null when the stored payload,
 * salt or link is not even well-formed.
 */
export function recomputeRecordHash(record: LedgerRecord): string | null {
  if (record.payloadError !== undefined) return null;
  try {
    return computeRecordHash(canonicalize(record.payload), record.salt, record.previousHash);
  } catch (error) {
    if (error instanceof HashInputError) return null;
    throw error;
  }
}

export function assertVerified(result: VerificationResult): void {
  if (!result.ok) {
    throw new TamperDetectedError(
      result.finding ?? { subject: 'record', reason: result.reason ?? 'hash_mismatch', detail: 'verification failed' }
    );
  }
}

function recordFinding(record: LedgerRecord, reason: TamperReason, detail: string): TamperDetected {
  return { subject: 'record', reason, recordId: record.id, partition: record.partition, detail };
}

function hashMismatchDetail(record: LedgerRecord, recomputed: string | null): string {
  if (record.payloadError !== undefined) {
    return `stored payload does not decode: ${record.payloadError}`;
  }
  return `stored ${shortHash(record.recordHash)}, recomputed ${recomputed === null ? 'nothing (malformed salt or link)' : shortHash(recomputed)}`;
}

/**
 * The supersedes column is not hashed; it has to repeat the hashed field.
 */
function supersedesProblem(record: LedgerRecord): string | null {
  const hashed = record.payload[SUPERSEDES_FIELD] ?? null;
  if (hashed === record.supersedes) return null;
  const claimed = hashed === null ? 'none' : typeof hashed === 'string' ? hashed : JSON.stringify(hashed);
  return `supersedes column names ${record.supersedes ?? 'none'}, hashed payload names ${claimed}`;
}

function failed(finding: TamperDetected, checked: number): VerificationResult {
  logger.warn('tamper detected', {
    subject: finding.subject,
    reason: finding.reason,
    record_id: finding.recordId,
    partition: finding.partition,
    period: finding.period,
    detail: finding.detail
  });
  return {
    ok: false,
    reason: finding.reason,
    ...(finding.recordId !== undefined ? { firstBrokenRecordId: finding.recordId } : {}),
    finding,
    checked
  };
}

export class Verifier {
  private store: LedgerStore;

  constructor(store: LedgerStore) {
    this.store = store;
  }

  async verifyRecord(recordId: string): Promise<VerificationResult> {
    const record = await this.store.getRecord(recordId);
    if (!record) {
      throw new RecordNotFoundError(recordId);
    }

    const recomputed = recomputeRecordHash(record);
    if (recomputed !== record.recordHash) {
      return failed(recordFinding(record, 'hash_mismatch', hashMismatchDetail(record, recomputed)), 1);
    }

    const supersedes = supersedesProblem(record);
    if (supersedes) {
      return failed(recordFinding(record, 'supersedes_mismatch', supersedes), 1);
    }
    return { ok: true, checked: 1 };
  }

  /**
   * Check `partition` from `fromId` to `toId` (inclusive; defaults are the
   * genesis record and the head). The first record's link is checked
   * against its predecessor even when that predecessor is outside the range.
   */
  async verifyChain(partition: string, fromId?: string, toId?: string): Promise<VerificationResult> {
    assertPartition(partition);

    const fromSequence = fromId !== undefined ? (await this.boundary(partition, fromId)).sequence : 1;
    const toSequence = toId !== undefined ? (await this.boundary(partition, toId)).sequence : undefined;
    if (toSequence !== undefined && toSequence < fromSequence) {
      throw new PayloadValidationError(`Range end ${toId} precedes range start ${fromId}`);
    }

    const records = await this.store.listRecords(partition, { fromSequence, toSequence });

    let prior: LedgerRecord | null = null;
    let priorHash: string | null = null;
    if (fromSequence > 1) {
      const [predecessor] = await this.store.listRecords(partition, {
        fromSequence: fromSequence - 1,
        toSequence: fromSequence - 1
      });
      prior = predecessor ?? null;
      priorHash = predecessor ? recomputeRecordHash(predecessor) : null;
    }

    const seen = new Set<string>();
    let expectedSequence = fromSequence;

    for (const [index, record] of records.entries()) {
      const checked = index + 1;

      if (record.sequence !== expectedSequence) {
        return failed(
          recordFinding(record, 'sequence_gap', `expected sequence ${expectedSequence}, found ${record.sequence}`),
          checked
        );
      }

      const linkProblem = this.checkLink(record, prior, priorHash);
      if (linkProblem) {
        return failed(recordFinding(record, 'chain_break', linkProblem), checked);
      }

      if (seen.has(record.recordHash)) {
        return failed(
          recordFinding(record, 'duplicate_hash', `hash ${shortHash(record.recordHash)} appears twice`),
          checked
        );
      }
      seen.add(record.recordHash);

      const recomputed = recomputeRecordHash(record);
      if (recomputed !== record.recordHash) {
        return failed(recordFinding(record, 'hash_mismatch', hashMismatchDetail(record, recomputed)), checked);
      }

      const supersedes = supersedesProblem(record);
      if (supersedes) {
        return failed(recordFinding(record, 'supersedes_mismatch', supersedes), checked);
      }

      prior = record;
      priorHash = recomputed;
      expectedSequence++;
    }

    logger.debug('chain verified', { partition, from_sequence: fromSequence, checked: records.length });
    return { ok: true, checked: records.length };
  }

  async verifyAnchor(partition: string, period: string): Promise<VerificationResult> {
    assertPartition(partition);
    assertPeriod(period);

    const anchor = await this.store.getAnchor(partition, period);
    if (!anchor) {
      throw new AnchorNotFoundError(partition, period);
    }

    const records = await recordsInPeriod(this.store, partition, period);
    const rootHash = records.length > 0 ? computeMerkleRoot(records.map(record => record.recordHash)) : null;

    if (rootHash !== anchor.rootHash || records.length !== anchor.recordCount) {
      return failed(
        {
          subject: 'period',
          reason: 'anchor_mismatch',
          partition,
          period,
          detail:
            `anchored root ${shortHash(anchor.rootHash)} over ${anchor.recordCount} records, ` +
            `now ${rootHash === null ? 'no records' : shortHash(rootHash)} over ${records.length}`
        },
        records.length
      );
    }
    return { ok: true, checked: records.length };
  }

  /**
   * Anchor check, then a chain check over the period's records to locate
   * the divergence.
   */
  async auditPeriod(partition: string, period: string): Promise<PeriodAudit> {
    const anchor = await this.verifyAnchor(partition, period);

    const records = await recordsInPeriod(this.store, partition, period);
    const first = records[0];
    const last = records[records.length - 1];
    const chain =
      first && last ? await this.verifyChain(partition, first.id, last.id) : { ok: true, checked: 0 };

    return { partition, period, ok: anchor.ok && chain.ok, anchor, chain };
  }

  private checkLink(record: LedgerRecord, prior: LedgerRecord | null, priorHash: string | null): string | null {
    if (record.sequence === 1) {
      return record.previousHash === null ? null : 'genesis record has a previous hash';
    }
    if (record.previousHash === null) {
      return 'non-genesis record has no previous hash';
    }
    if (!prior) {
      return `predecessor of sequence ${record.sequence} is missing`;
    }
    if (record.previousHash !== priorHash) {
      return `previous hash ${shortHash(record.previousHash)} does not match record ${prior.id}`;
    }
    return null;
  }

  private async boundary(partition: string, recordId: string): Promise<LedgerRecord> {
    const record = await this.store.getRecord(recordId);
    if (!record) {
      throw new RecordNotFoundError(recordId);
    }
    if (record.partition !== partition) {
      throw new PayloadValidationError(`Record ${recordId} belongs to partition "${record.partition}", not "${partition}"`);
    }
    return record;
  }
}
