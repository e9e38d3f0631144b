/**
 * FileLedgerStore - JSONL ledger storage
 *
 * Layout:
 *   <root>/partitions/<partition>/records.jsonl
 *   <root>/partitions/<partition>/anchors.jsonl
 *   <root>/partitions/<partition>/annotations.jsonl
 *   <root>/partitions/<partition>/.lock
 *
 * A line counts as written once its trailing newline is on disk. A partial
 * last line left by a crash is ignored on read and cut off before the next
 * write. The partition head is the last complete record line.
 *
 * A record's initial annotation line is written before the record line. If
 * the record line never lands, the orphaned annotation stays invisible,
 * because annotations are only read for records that exist.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import {
  AnchorPeriodChangedError,
  AnnotationEntry,
  ChainHead,
  ChainHeadConflictError,
  LedgerRecord,
  MerkleAnchor,
  PeriodAlreadyAnchoredError,
  RecordHashCollisionError,
  RecordNotFoundError,
  assertPartition,
  canonicalString,
  createLogger,
  decodeStoredPayload,
  isValidPartition,
  parseCanonical,
  periodBounds,
  periodOf
} from 'carbon-ledger-core';
import { LedgerStore, RecordRange, StoreBackend } from '../../interfaces';
import { FileLockOptions, isErrnoException, withLock } from './lock';

const logger = createLogger('file-store');

const RECORDS_FILE = 'records.jsonl';
const ANCHORS_FILE = 'anchors.jsonl';
const ANNOTATIONS_FILE = 'annotations.jsonl';
const LOCK_FILE = '.lock';

const RecordLine = z.object({
  id: z.string(),
  partition: z.string(),
  sequence: z.number().int(),
  payload_json: z.string(),
  salt: z.string(),
  previous_hash: z.string().nullable(),
  record_hash: z.string(),
  supersedes: z.string().nullable(),
  created_at: z.string()
});

const AnchorLine = z.object({
  partition: z.string(),
  period: z.string(),
  root_hash: z.string(),
  record_count: z.number().int(),
  created_at: z.string()
});

const AnnotationLine = z.object({
  record_id: z.string(),
  fields_json: z.string(),
  created_at: z.string()
});

interface JsonlContent {
  lines: string[];
  completeBytes: number;
  tornBytes: number;
}

export interface FileLedgerStoreOptions {
  lockTimeoutMs?: number;
  staleLockMs?: number;
}

export class FileLedgerStore implements LedgerStore {
  readonly backend: StoreBackend = 'FILE';

  private rootDir: string;
  private partitionsDir: string;
  private lockOptions: FileLockOptions;

  constructor(rootDir: string, opts: FileLedgerStoreOptions = {}) {
    this.rootDir = rootDir;
    this.partitionsDir = path.join(rootDir, 'partitions');
    this.lockOptions = {
      timeoutMs: opts.lockTimeoutMs ?? 5000,
      staleMs: opts.staleLockMs ?? 30000
    };
  }

  async initialize(): Promise<void> {
    await fs.mkdir(this.partitionsDir, { recursive: true });
    logger.debug('store opened', { path: this.rootDir });
  }

  async shutdown(): Promise<void> {
    // nothing held open between calls
  }

  async getHead(partition: string): Promise<ChainHead | null> {
    const records = await this.readRecords(partition);
    const last = records[records.length - 1];
    return last ? { partition, headHash: last.recordHash, sequence: last.sequence } : null;
  }

  async commitRecord(record: LedgerRecord, expectedHead: string | null, annotation?: AnnotationEntry): Promise<void> {
    assertPartition(record.partition);
    const dir = this.partitionDir(record.partition);
    await fs.mkdir(dir, { recursive: true });

    await withLock(path.join(dir, LOCK_FILE), this.lockOptions, async () => {
      const recordsPath = path.join(dir, RECORDS_FILE);
      const content = await readJsonl(recordsPath);
      const records = content.lines.map(line => parseRecordLine(line, recordsPath));
      const last = records[records.length - 1];
      const actualHead = last ? last.recordHash : null;
      const nextSequence = (last ? last.sequence : 0) + 1;

      if (
        actualHead !== expectedHead ||
        record.previousHash !== actualHead ||
        record.sequence !== nextSequence
      ) {
        throw new ChainHeadConflictError(record.partition, expectedHead, actualHead);
      }
      if (records.some(existing => existing.recordHash === record.recordHash)) {
        throw new RecordHashCollisionError(record.partition, record.recordHash);
      }

      const period = periodOf(record.createdAt);
      if ((await this.readAnchors(record.partition)).some(anchor => anchor.period === period)) {
        throw new PeriodAlreadyAnchoredError(record.partition, period);
      }

      if (annotation) {
        const annotationsPath = path.join(dir, ANNOTATIONS_FILE);
        await appendJsonl(annotationsPath, await readJsonl(annotationsPath), serializeAnnotation(annotation));
      }
      await appendJsonl(recordsPath, content, serializeRecord(record));
    });
  }

  async getRecord(recordId: string): Promise<LedgerRecord | null> {
    for (const partition of await this.listPartitions()) {
      const found = (await this.readRecords(partition)).find(record => record.id === recordId);
      if (found) return found;
    }
    return null;
  }

  async listRecords(partition: string, range: RecordRange = {}): Promise<LedgerRecord[]> {
    const from = range.fromSequence ?? 1;
    const to = range.toSequence ?? Number.MAX_SAFE_INTEGER;
    const records = await this.readRecords(partition);
    return records.filter(record => record.sequence >= from && record.sequence <= to);
  }

  async listRecordsCreatedBetween(partition: string, start: string, end: string): Promise<LedgerRecord[]> {
    const records = await this.readRecords(partition);
    return records.filter(record => record.createdAt >= start && record.createdAt < end);
  }

  async findSuccessor(recordId: string): Promise<LedgerRecord | null> {
    const original = await this.getRecord(recordId);
    if (!original) return null;
    const records = await this.readRecords(original.partition);
    return records.find(record => record.supersedes === recordId) ?? null;
  }

  async listPartitions(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.partitionsDir);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return [];
      throw error;
    }

    const partitions: string[] = [];
    for (const name of entries.filter(isValidPartition).sort()) {
      const content = await readJsonl(path.join(this.partitionsDir, name, RECORDS_FILE));
      if (content.lines.length > 0) partitions.push(name);
    }
    return partitions;
  }

  async listPeriods(partition: string): Promise<string[]> {
    const records = await this.readRecords(partition);
    return [...new Set(records.map(record => record.createdAt.slice(0, 10)))].sort();
  }

  async getAnchor(partition: string, period: string): Promise<MerkleAnchor | null> {
    const anchors = await this.listAnchors(partition);
    return anchors.find(anchor => anchor.period === period) ?? null;
  }

  async insertAnchor(anchor: MerkleAnchor): Promise<boolean> {
    assertPartition(anchor.partition);
    const dir = this.partitionDir(anchor.partition);
    await fs.mkdir(dir, { recursive: true });

    return withLock(path.join(dir, LOCK_FILE), this.lockOptions, async () => {
      const anchorsPath = path.join(dir, ANCHORS_FILE);
      const content = await readJsonl(anchorsPath);
      const exists = content.lines
        .map(line => parseAnchorLine(line, anchorsPath))
        .some(existing => existing.period === anchor.period);
      if (exists) return false;

      const { start, end } = periodBounds(anchor.period);
      const count = (await this.readRecords(anchor.partition)).filter(
        record => record.createdAt >= start && record.createdAt < end
      ).length;
      if (count !== anchor.recordCount) {
        throw new AnchorPeriodChangedError(anchor.partition, anchor.period, anchor.recordCount, count);
      }

      await appendJsonl(anchorsPath, content, serializeAnchor(anchor));
      return true;
    });
  }

  async listAnchors(partition: string): Promise<MerkleAnchor[]> {
    const anchors = await this.readAnchors(partition);
    return anchors.sort((a, b) => a.period.localeCompare(b.period));
  }

  async appendAnnotation(entry: AnnotationEntry): Promise<void> {
    const record = await this.getRecord(entry.recordId);
    if (!record) throw new RecordNotFoundError(entry.recordId);

    const dir = this.partitionDir(record.partition);
    await withLock(path.join(dir, LOCK_FILE), this.lockOptions, async () => {
      const annotationsPath = path.join(dir, ANNOTATIONS_FILE);
      await appendJsonl(annotationsPath, await readJsonl(annotationsPath), serializeAnnotation(entry));
    });
  }

  async listAnnotations(recordId: string): Promise<AnnotationEntry[]> {
    const record = await this.getRecord(recordId);
    if (!record) return [];

    const annotationsPath = path.join(this.partitionDir(record.partition), ANNOTATIONS_FILE);
    const content = await readJsonl(annotationsPath);
    return content.lines
      .map(line => parseAnnotationLine(line, annotationsPath))
      .filter(entry => entry.recordId === recordId);
  }

  private partitionDir(partition: string): string {
    return path.join(this.partitionsDir, partition);
  }

  private async readAnchors(partition: string): Promise<MerkleAnchor[]> {
    if (!isValidPartition(partition)) return [];
    const anchorsPath = path.join(this.partitionDir(partition), ANCHORS_FILE);
    const content = await readJsonl(anchorsPath);
    return content.lines.map(line => parseAnchorLine(line, anchorsPath));
  }

  private async readRecords(partition: string): Promise<LedgerRecord[]> {
    if (!isValidPartition(partition)) return [];
    const recordsPath = path.join(this.partitionDir(partition), RECORDS_FILE);
    const content = await readJsonl(recordsPath);
    return content.lines.map(line => parseRecordLine(line, recordsPath));
  }
}

async function readJsonl(filePath: string): Promise<JsonlContent> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return { lines: [], completeBytes: 0, tornBytes: 0 };
    }
    throw error;
  }

  const lastNewline = raw.lastIndexOf('\n');
  const complete = raw.slice(0, lastNewline + 1);
  const torn = raw.slice(lastNewline + 1);

  return {
    lines: complete.split('\n').filter(line => line.trim().length > 0),
    completeBytes: Buffer.byteLength(complete, 'utf-8'),
    tornBytes: Buffer.byteLength(torn, 'utf-8')
  };
}

async function appendJsonl(filePath: string, current: JsonlContent, entry: Record<string, unknown>): Promise<void> {
  if (current.tornBytes > 0) {
    await fs.truncate(filePath, current.completeBytes);
    logger.warn('partial line truncated', { file: filePath, bytes: current.tornBytes });
  }
  await fs.appendFile(filePath, JSON.stringify(entry) + '\n', 'utf-8');
}

function parseLine<T>(schema: z.ZodType<T>, line: string, filePath: string): T {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (error) {
    throw new Error(`Corrupt line in ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`Corrupt line in ${filePath}: ${parsed.error.issues.map(issue => issue.message).join('; ')}`);
  }
  return parsed.data;
}

function parseRecordLine(line: string, filePath: string): LedgerRecord {
  const row = parseLine(RecordLine, line, filePath);
  return {
    id: row.id,
    partition: row.partition,
    sequence: row.sequence,
    salt: row.salt,
    previousHash: row.previous_hash,
    recordHash: row.record_hash,
    supersedes: row.supersedes,
    createdAt: row.created_at,
    ...decodeStoredPayload(row.payload_json)
  };
}

function parseAnchorLine(line: string, filePath: string): MerkleAnchor {
  const row = parseLine(AnchorLine, line, filePath);
  return {
    partition: row.partition,
    period: row.period,
    rootHash: row.root_hash,
    recordCount: row.record_count,
    createdAt: row.created_at
  };
}

function parseAnnotationLine(line: string, filePath: string): AnnotationEntry {
  const row = parseLine(AnnotationLine, line, filePath);
  return { recordId: row.record_id, fields: parseCanonical(row.fields_json), createdAt: row.created_at };
}

function serializeRecord(record: LedgerRecord): Record<string, unknown> {
  return {
    id: record.id,
    partition: record.partition,
    sequence: record.sequence,
    payload_json: canonicalString(record.payload),
    salt: record.salt,
    previous_hash: record.previousHash,
    record_hash: record.recordHash,
    supersedes: record.supersedes,
    created_at: record.createdAt
  };
}

function serializeAnchor(anchor: MerkleAnchor): Record<string, unknown> {
  return {
    partition: anchor.partition,
    period: anchor.period,
    root_hash: anchor.rootHash,
    record_count: anchor.recordCount,
    created_at: anchor.createdAt
  };
}

function serializeAnnotation(entry: AnnotationEntry): Record<string, unknown> {
  return { record_id: entry.recordId, fields_json: canonicalString(entry.fields), created_at: entry.createdAt };
}
