/**
 * Merkle Anchorer
 *
 * Commits each closed UTC day of a partition to one Merkle root over the
 * record hashes created that day, in sequence order. Anchors are written
 * once and never changed. Re-anchoring an unchanged day returns the
 * stored anchor; a day whose records no longer produce the stored root is
 * an integrity failure. Stores refuse records dated in an anchored day, and
 * refuse an anchor whose day gained records after it was read; the anchorer
 * then reads the day again.
 */

import {
  AnchorNotFoundError,
  AnchorPeriodAlreadyClosedError,
  AnchorPeriodChangedError,
  AnchorPeriodOpenError,
  EmptyAnchorPeriodError,
  LedgerRecord,
  MerkleAnchor,
  assertPartition,
  assertPeriod,
  computeMerkleRoot,
  createLogger,
  isPeriodClosed,
  periodBounds,
  shortHash
} from 'carbon-ledger-core';
import { LedgerStore } from 'carbon-ledger-storage';

const logger = createLogger('anchorer');

const MAX_ANCHOR_ATTEMPTS = 3;

/**
 * Records of `partition` created within `period`, in sequence order.
 */
export async function recordsInPeriod(
  store: LedgerStore,
  partition: string,
  period: string
): Promise<LedgerRecord[]> {
  const { start, end } = periodBounds(period);
  return store.listRecordsCreatedBetween(partition, start, end);
}

export class MerkleAnchorer {
  private store: LedgerStore;
  private clock: () => Date;

  constructor(store: LedgerStore, clock: () => Date) {
    this.store = store;
    this.clock = clock;
  }

  async anchorPeriod(partition: string, period: string): Promise<MerkleAnchor> {
    assertPartition(partition);
    assertPeriod(period);

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.anchorOnce(partition, period);
      } catch (error) {
        if (error instanceof AnchorPeriodChangedError && attempt < MAX_ANCHOR_ATTEMPTS) {
          logger.warn('period changed while anchoring, reading it again', {
            partition,
            period,
            attempt,
            expected: error.expectedCount,
            actual: error.actualCount
          });
          continue;
        }
        throw error;
      }
    }
  }

  private async anchorOnce(partition: string, period: string): Promise<MerkleAnchor> {
    if (!isPeriodClosed(period, this.clock())) {
      throw new AnchorPeriodOpenError(period);
    }

    const records = await recordsInPeriod(this.store, partition, period);
    if (records.length === 0) {
      throw new EmptyAnchorPeriodError(partition, period);
    }

    const rootHash = computeMerkleRoot(records.map(record => record.recordHash));
    const existing = await this.store.getAnchor(partition, period);
    if (existing) {
      return this.reconcile(existing, rootHash, records.length);
    }

    const anchor: MerkleAnchor = {
      partition,
      period,
      rootHash,
      recordCount: records.length,
      createdAt: this.clock().toISOString()
    };

    if (!(await this.store.insertAnchor(anchor))) {
      // lost an insert race; the winner must agree with us
      const winner = await this.store.getAnchor(partition, period);
      if (!winner) throw new AnchorNotFoundError(partition, period);
      return this.reconcile(winner, rootHash, records.length);
    }

    logger.info('period anchored', {
      partition,
      period,
      root_hash: shortHash(rootHash),
      record_count: records.length
    });
    return anchor;
  }

  /**
   * Anchor every closed, non-empty, not yet anchored period of one
   * partition, or of all partitions.
   */
  async anchorPendingPeriods(partition?: string): Promise<MerkleAnchor[]> {
    const partitions = partition !== undefined ? [partition] : await this.store.listPartitions();
    const now = this.clock();
    const created: MerkleAnchor[] = [];

    for (const name of partitions) {
      assertPartition(name);
      const anchored = new Set((await this.store.listAnchors(name)).map(anchor => anchor.period));
      const pending = (await this.store.listPeriods(name)).filter(
        period => !anchored.has(period) && isPeriodClosed(period, now)
      );

      for (const period of pending) {
        created.push(await this.anchorPeriod(name, period));
      }
    }

    if (created.length > 0) {
      logger.info('pending periods anchored', { count: created.length });
    }
    return created;
  }

  private reconcile(existing: MerkleAnchor, rootHash: string, recordCount: number): MerkleAnchor {
    if (existing.rootHash === rootHash && existing.recordCount === recordCount) {
      return existing;
    }

    const detail =
      `stored root ${shortHash(existing.rootHash)} over ${existing.recordCount} records, ` +
      `recomputed ${shortHash(rootHash)} over ${recordCount}`;
    logger.error('anchor mismatch on re-anchor', { partition: existing.partition, period: existing.period, detail });
    throw new AnchorPeriodAlreadyClosedError(existing.partition, existing.period, detail);
  }
}
