/**
 * CarbonLedger - external interface of the integrity ledger
 *
 * Ingestion calls appendRecord/amendRecord; audit tooling calls the
 * verify* operations, anchorPeriod and proveInclusion. Every operation
 * goes through one LedgerStore, so several processes may share a ledger.
 */

import {
  AnchorNotFoundError,
  AnnotationEntry,
  FieldMap,
  InclusionProof,
  LedgerRecord,
  MerkleAnchor,
  PayloadValidationError,
  PayloadValue,
  RecordNotFoundError,
  VerificationResult,
  assertFieldMap,
  assertPartition,
  buildMerkleProof,
  canonicalize,
  computeRecordHash,
  createLogger,
  periodOf
} from 'carbon-ledger-core';
import {
  DEFAULT_ANNOTATION_FIELDS,
  LedgerStore,
  RecordRange,
  createLedgerStore,
  loadLedgerConfigFromEnv
} from 'carbon-ledger-storage';
import { AnchorScheduler } from './anchor-scheduler';
import { MerkleAnchorer, recordsInPeriod } from './anchorer';
import { ChainBuilder } from './chain-builder';
import { PeriodAudit, Verifier } from './verifier';

const logger = createLogger('ledger');

export interface CarbonLedgerOptions {
  store: LedgerStore;
  defaultPartition?: string;
  appendMaxRetries?: number;
  annotationFields?: readonly string[];
  anchorIntervalMs?: number;
  clock?: () => Date;
}

export interface AppendOptions {
  partition?: string;
}

export interface RecordAnnotations {
  recordId: string;
  fields: FieldMap; // key-wise merge of all entries, later entries win
  entries: AnnotationEntry[];
}

/**
 * Outcome of recomputing a record's hash with one payload field changed.
 * Nothing is written.
 */
export interface TamperSimulation {
  recordId: string;
  field: string;
  originalValue: PayloadValue;
  tamperedValue: PayloadValue;
  storedHash: string;
  tamperedHash: string;
  detected: boolean;
}

export class CarbonLedger {
  readonly store: LedgerStore;
  readonly defaultPartition: string;
  readonly annotationFields: readonly string[];
  readonly anchorIntervalMs: number;

  private chainBuilder: ChainBuilder;
  private anchorer: MerkleAnchorer;
  private verifier: Verifier;
  private clock: () => Date;

  constructor(options: CarbonLedgerOptions) {
    const clock = options.clock ?? (() => new Date());

    this.clock = clock;
    this.store = options.store;
    this.defaultPartition = options.defaultPartition ?? 'global';
    this.annotationFields = options.annotationFields ?? DEFAULT_ANNOTATION_FIELDS;
    this.anchorIntervalMs = options.anchorIntervalMs ?? 24 * 60 * 60 * 1000;
    assertPartition(this.defaultPartition);

    this.chainBuilder = new ChainBuilder(this.store, {
      maxRetries: options.appendMaxRetries ?? 3,
      annotationFields: this.annotationFields,
      clock
    });
    this.anchorer = new MerkleAnchorer(this.store, clock);
    this.verifier = new Verifier(this.store);
  }

  /**
   * Build a ledger from LEDGER_* environment variables. Fail-closed.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): CarbonLedger {
    const config = loadLedgerConfigFromEnv(env);
    return new CarbonLedger({
      store: createLedgerStore(config),
      defaultPartition: config.defaultPartition,
      appendMaxRetries: config.appendMaxRetries,
      annotationFields: config.annotationFields,
      anchorIntervalMs: config.anchorIntervalMs
    });
  }

  async initialize(): Promise<void> {
    await this.store.initialize();
    logger.info('ledger ready', { backend: this.store.backend, default_partition: this.defaultPartition });
  }

  async shutdown(): Promise<void> {
    await this.store.shutdown();
  }

  // Write path

  async appendRecord(payload: FieldMap, options: AppendOptions = {}): Promise<LedgerRecord> {
    return this.chainBuilder.append(options.partition ?? this.defaultPartition, payload);
  }

  async amendRecord(recordId: string, newPayload: FieldMap): Promise<LedgerRecord> {
    return this.chainBuilder.amend(recordId, newPayload);
  }

  async annotateRecord(recordId: string, fields: FieldMap): Promise<AnnotationEntry> {
    assertFieldMap(fields);
    const names = Object.keys(fields);
    if (names.length === 0) {
      throw new PayloadValidationError('Annotation has no fields');
    }
    const unexpected = names.filter(name => !this.annotationFields.includes(name));
    if (unexpected.length > 0) {
      throw new PayloadValidationError(
        `Not annotation field(s): ${unexpected.join(', ')} (configured: ${this.annotationFields.join(', ') || 'none'})`
      );
    }

    await this.requireRecord(recordId);
    const entry: AnnotationEntry = { recordId, fields, createdAt: this.clock().toISOString() };
    await this.store.appendAnnotation(entry);
    return entry;
  }

  // Anchoring

  async anchorPeriod(partition: string, period: string): Promise<MerkleAnchor> {
    return this.anchorer.anchorPeriod(partition, period);
  }

  async anchorPendingPeriods(partition?: string): Promise<MerkleAnchor[]> {
    return this.anchorer.anchorPendingPeriods(partition);
  }

  createAnchorScheduler(onError?: (error: unknown) => void): AnchorScheduler {
    return new AnchorScheduler(this, { intervalMs: this.anchorIntervalMs, onError });
  }

  // Verification

  async verifyRecord(recordId: string): Promise<VerificationResult> {
    return this.verifier.verifyRecord(recordId);
  }

  async verifyChain(partition: string, fromId?: string, toId?: string): Promise<VerificationResult> {
    return this.verifier.verifyChain(partition, fromId, toId);
  }

  async verifyAnchor(partition: string, period: string): Promise<VerificationResult> {
    return this.verifier.verifyAnchor(partition, period);
  }

  async auditPeriod(partition: string, period: string): Promise<PeriodAudit> {
    return this.verifier.auditPeriod(partition, period);
  }

  /**
   * Merkle path from a record to its period's anchor root, built from the
   * hashes as currently stored. Check it with verifyMerkleProof.
   */
  async proveInclusion(recordId: string): Promise<InclusionProof> {
    const record = await this.requireRecord(recordId);
    const period = periodOf(record.createdAt);

    const anchor = await this.store.getAnchor(record.partition, period);
    if (!anchor) {
      throw new AnchorNotFoundError(record.partition, period);
    }

    const leaves = await recordsInPeriod(this.store, record.partition, period);
    const leafIndex = leaves.findIndex(leaf => leaf.id === recordId);

    return {
      recordId,
      recordHash: record.recordHash,
      partition: record.partition,
      period,
      leafIndex,
      steps: buildMerkleProof(
        leaves.map(leaf => leaf.recordHash),
        leafIndex
      ),
      rootHash: anchor.rootHash
    };
  }

  /**
   * What-if: the hash a record would need if `field` held `value`.
   */
  async simulateTamper(recordId: string, field: string, value: PayloadValue): Promise<TamperSimulation> {
    const record = await this.requireRecord(recordId);
    const tampered: FieldMap = { ...record.payload, [field]: value };
    const tamperedHash = computeRecordHash(canonicalize(tampered), record.salt, record.previousHash);

    return {
      recordId,
      field,
      originalValue: field in record.payload ? record.payload[field] : null,
      tamperedValue: value,
      storedHash: record.recordHash,
      tamperedHash,
      detected: tamperedHash !== record.recordHash
    };
  }

  // Reads

  async getRecord(recordId: string): Promise<LedgerRecord> {
    return this.requireRecord(recordId);
  }

  async listRecords(partition: string = this.defaultPartition, range?: RecordRange): Promise<LedgerRecord[]> {
    assertPartition(partition);
    return this.store.listRecords(partition, range);
  }

  /**
   * Every revision of a record, oldest first, ending with the current one.
   */
  async listRevisions(recordId: string): Promise<LedgerRecord[]> {
    let earliest = await this.requireRecord(recordId);
    const older: LedgerRecord[] = [];
    while (earliest.supersedes !== null) {
      older.unshift(earliest);
      earliest = await this.requireRecord(earliest.supersedes);
    }

    const revisions = [earliest, ...older];
    let latest = revisions[revisions.length - 1];
    for (;;) {
      const next = await this.store.findSuccessor(latest.id);
      if (!next) break;
      revisions.push(next);
      latest = next;
    }
    return revisions;
  }

  async getAnnotations(recordId: string): Promise<RecordAnnotations> {
    await this.requireRecord(recordId);
    const entries = await this.store.listAnnotations(recordId);
    const fields: FieldMap = {};
    for (const entry of entries) {
      Object.assign(fields, entry.fields);
    }
    return { recordId, fields, entries };
  }

  async listAnchors(partition: string = this.defaultPartition): Promise<MerkleAnchor[]> {
    assertPartition(partition);
    return this.store.listAnchors(partition);
  }

  private async requireRecord(recordId: string): Promise<LedgerRecord> {
    const record = await this.store.getRecord(recordId);
    if (!record) {
      throw new RecordNotFoundError(recordId);
    }
    return record;
  }
}
