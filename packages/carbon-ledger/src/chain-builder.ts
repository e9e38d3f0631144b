/**
 * Chain Builder
 *
 * Appends records to a partition's hash chain. Each append reads the
 * persisted head, hashes the payload against it and commits with an
 * optimistic check on that head. Within this process appends to one
 * partition are queued; across processes the store's compare-and-set
 * decides, and a losing writer re-reads the head and tries again.
 *
 * Corrections never rewrite a record: amend() appends a new record whose
 * payload carries `__supersedes: <original id>`.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  AnnotationEntry,
  ChainHeadConflictError,
  FieldMap,
  HashInputError,
  LedgerRecord,
  PayloadValidationError,
  PeriodAlreadyAnchoredError,
  RecordAlreadySupersededError,
  RecordHashCollisionError,
  RecordNotFoundError,
  assertFieldMap,
  assertPartition,
  canonicalString,
  computeRecordHash,
  createLogger,
  errorMeta,
  generateSalt,
  parseCanonical,
  shortHash
} from 'carbon-ledger-core';
import { LedgerStore } from 'carbon-ledger-storage';
import { PartitionLock } from './partition-lock';

const logger = createLogger('chain-builder');

/**
 * Payload keys with this prefix are written by the ledger itself.
 */
export const RESERVED_PREFIX = '__';
export const SUPERSEDES_FIELD = '__supersedes';

export interface ChainBuilderOptions {
  maxRetries: number; // total attempts per append
  annotationFields: readonly string[];
  clock: () => Date;
}

export interface SplitPayload {
  hashed: FieldMap;
  annotations: FieldMap;
}

/**
 * Separate configured annotation fields from the fields that get hashed.
 */
export function splitPayload(payload: FieldMap, annotationFields: readonly string[]): SplitPayload {
  const hashed: FieldMap = {};
  const annotations: FieldMap = {};
  for (const [field, value] of Object.entries(payload)) {
    if (annotationFields.includes(field)) {
      annotations[field] = value;
    } else {
      hashed[field] = value;
    }
  }
  return { hashed, annotations };
}

export class ChainBuilder {
  private store: LedgerStore;
  private options: ChainBuilderOptions;
  private lock: PartitionLock;

  constructor(store: LedgerStore, options: ChainBuilderOptions, lock: PartitionLock = new PartitionLock()) {
    if (!Number.isInteger(options.maxRetries) || options.maxRetries < 1) {
      throw new RangeError(`maxRetries must be a positive integer, got ${options.maxRetries}`);
    }
    this.store = store;
    this.options = options;
    this.lock = lock;
  }

  async append(partition: string, payload: FieldMap): Promise<LedgerRecord> {
    assertPartition(partition);
    const split = this.validate(payload);
    return this.appendWithRetry(partition, split, null);
  }

  async amend(recordId: string, newPayload: FieldMap): Promise<LedgerRecord> {
    const original = await this.store.getRecord(recordId);
    if (!original) {
      throw new RecordNotFoundError(recordId);
    }

    const split = this.validate(newPayload);
    split.hashed[SUPERSEDES_FIELD] = recordId;
    return this.appendWithRetry(original.partition, split, recordId);
  }

  private validate(payload: FieldMap): SplitPayload {
    assertFieldMap(payload);

    const reserved = Object.keys(payload).filter(field => field.startsWith(RESERVED_PREFIX));
    if (reserved.length > 0) {
      throw new PayloadValidationError(`Reserved payload field(s): ${reserved.join(', ')}`);
    }

    const split = splitPayload(payload, this.options.annotationFields);
    if (Object.keys(split.hashed).length === 0) {
      throw new PayloadValidationError('Payload has no hashed fields');
    }
    return split;
  }

  private async appendWithRetry(
    partition: string,
    split: SplitPayload,
    supersedes: string | null
  ): Promise<LedgerRecord> {
    // the stored payload is decoded from the hashed text, detached from caller objects
    const text = canonicalString(split.hashed);
    const canonical = Buffer.from(text, 'utf8');
    const detached: SplitPayload = {
      hashed: parseCanonical(text),
      annotations: parseCanonical(canonicalString(split.annotations))
    };

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.lock.run(partition, () => this.commitOnce(partition, detached, canonical, supersedes));
      } catch (error) {
        if (error instanceof ChainHeadConflictError && attempt < this.options.maxRetries) {
          logger.warn('chain head moved, retrying append', {
            partition,
            attempt,
            expected: shortHash(error.expectedHead),
            actual: shortHash(error.actualHead)
          });
          continue;
        }
        if (error instanceof PeriodAlreadyAnchoredError && attempt < this.options.maxRetries) {
          logger.warn('period anchored before commit, retrying with a fresh timestamp', {
            partition,
            attempt,
            period: error.period
          });
          continue;
        }
        if (
          error instanceof ChainHeadConflictError ||
          error instanceof PeriodAlreadyAnchoredError ||
          error instanceof RecordHashCollisionError ||
          error instanceof HashInputError
        ) {
          logger.error('append failed', { partition, attempt, ...errorMeta(error) });
        }
        throw error;
      }
    }
  }

  private async commitOnce(
    partition: string,
    split: SplitPayload,
    canonical: Buffer,
    supersedes: string | null
  ): Promise<LedgerRecord> {
    if (supersedes !== null) {
      const successor = await this.store.findSuccessor(supersedes);
      if (successor) {
        throw new RecordAlreadySupersededError(supersedes, successor.id);
      }
    }

    const head = await this.store.getHead(partition);
    const previousHash = head ? head.headHash : null;
    const salt = generateSalt();
    const createdAt = this.options.clock().toISOString();

    const record: LedgerRecord = {
      id: uuidv4(),
      partition,
      sequence: (head ? head.sequence : 0) + 1,
      payload: split.hashed,
      salt,
      previousHash,
      recordHash: computeRecordHash(canonical, salt, previousHash),
      supersedes,
      createdAt
    };

    const annotation: AnnotationEntry | undefined =
      Object.keys(split.annotations).length > 0
        ? { recordId: record.id, fields: split.annotations, createdAt }
        : undefined;

    await this.store.commitRecord(record, previousHash, annotation);

    logger.info('record appended', {
      partition,
      record_id: record.id,
      sequence: record.sequence,
      record_hash: shortHash(record.recordHash),
      previous_hash: shortHash(previousHash),
      ...(supersedes ? { supersedes } : {})
    });
    return record;
  }
}
