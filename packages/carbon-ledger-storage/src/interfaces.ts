/**
 * Ledger Store Interface
 *
 * All ledger persistence goes through this interface. Backends keep records,
 * anchors and annotations append-only; the only mutable state is the
 * partition head, which moves forward together with each committed record.
 */

import { AnnotationEntry, ChainHead, LedgerRecord, MerkleAnchor } from 'carbon-ledger-core';

export type StoreBackend = 'FILE' | 'SQLITE';

export interface RecordRange {
  fromSequence?: number;
  toSequence?: number;
}

export interface LedgerStore {
  readonly backend: StoreBackend;

  /**
   * Create tables/directories. Idempotent.
   */
  initialize(): Promise<void>;

  shutdown(): Promise<void>;

  getHead(partition: string): Promise<ChainHead | null>;

  /**
   * Insert `record` and advance the partition head in one atomic step, but
   * only if the head still equals `expectedHead` (null: empty partition).
   *
   * @throws ChainHeadConflictError when the head moved
   * @throws RecordHashCollisionError when the hash already exists in the partition
   * @throws PeriodAlreadyAnchoredError when the day of `record.createdAt` is anchored
   */
  commitRecord(record: LedgerRecord, expectedHead: string | null, annotation?: AnnotationEntry): Promise<void>;

  getRecord(recordId: string): Promise<LedgerRecord | null>;

  /**
   * Records of one partition in sequence order, optionally bounded (inclusive).
   */
  listRecords(partition: string, range?: RecordRange): Promise<LedgerRecord[]>;

  /**
   * Records whose createdAt lies in [start, end), in sequence order.
   */
  listRecordsCreatedBetween(partition: string, start: string, end: string): Promise<LedgerRecord[]>;

  /**
   * The record that amends `recordId`, if any.
   */
  findSuccessor(recordId: string): Promise<LedgerRecord | null>;

  listPartitions(): Promise<string[]>;

  /**
   * Distinct UTC days (YYYY-MM-DD) that hold at least one record, ascending.
   */
  listPeriods(partition: string): Promise<string[]>;

  getAnchor(partition: string, period: string): Promise<MerkleAnchor | null>;

  /**
   * Insert-if-absent. Returns false when an anchor for (partition, period)
   * already exists; the existing anchor is left untouched. Throws
   * AnchorPeriodChangedError when the period no longer holds
   * `anchor.recordCount` records.
   */
  insertAnchor(anchor: MerkleAnchor): Promise<boolean>;

  listAnchors(partition: string): Promise<MerkleAnchor[]>;

  appendAnnotation(entry: AnnotationEntry): Promise<void>;

  listAnnotations(recordId: string): Promise<AnnotationEntry[]>;
}
