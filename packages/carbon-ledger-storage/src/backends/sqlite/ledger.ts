/**
 * SQLiteLedgerStore - SQLite-based ledger storage
 *
 * - WAL mode for concurrent readers
 * - busy_timeout for writers waiting on the lock
 * - commits run in BEGIN IMMEDIATE transactions, so head read, collision
 *   check, anchored-period check, insert and head update happen under one
 *   write lock; anchor inserts recount their period under the same lock
 * - triggers reject UPDATE/DELETE on records, anchors and annotations
 */

import Database from 'better-sqlite3';
import * as fs from 'fs/promises';
import * as path from 'path';
import {
  AnchorPeriodChangedError,
  AnnotationEntry,
  ChainHead,
  ChainHeadConflictError,
  LedgerRecord,
  MerkleAnchor,
  PeriodAlreadyAnchoredError,
  RecordHashCollisionError,
  assertPartition,
  canonicalString,
  createLogger,
  decodeStoredPayload,
  parseCanonical,
  periodBounds,
  periodOf
} from 'carbon-ledger-core';
import { LedgerStore, RecordRange, StoreBackend } from '../../interfaces';

const logger = createLogger('sqlite-store');

export interface SQLiteLedgerStoreConfig {
  dbPath: string;
  walMode?: boolean;
  busyTimeout?: number;
}

interface RecordRow {
  id: string;
  partition_id: string;
  sequence: number;
  payload_json: string;
  salt: string;
  previous_hash: string | null;
  record_hash: string;
  supersedes: string | null;
  created_at: string;
}

interface HeadRow {
  partition_id: string;
  head_hash: string;
  sequence: number;
}

interface AnchorRow {
  partition_id: string;
  period: string;
  root_hash: string;
  record_count: number;
  created_at: string;
}

interface AnnotationRow {
  record_id: string;
  fields_json: string;
  created_at: string;
}

const RECORD_COLUMNS =
  'id, partition_id, sequence, payload_json, salt, previous_hash, record_hash, supersedes, created_at';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS ledger_records (
    id TEXT PRIMARY KEY,
    partition_id TEXT NOT NULL,
    sequence INTEGER NOT NULL,
    payload_json TEXT NOT NULL,
    salt TEXT NOT NULL,
    previous_hash TEXT,
    record_hash TEXT NOT NULL,
    supersedes TEXT,
    created_at TEXT NOT NULL,
    UNIQUE (partition_id, sequence),
    UNIQUE (partition_id, record_hash)
  );

  CREATE INDEX IF NOT EXISTS idx_ledger_records_created ON ledger_records(partition_id, created_at);
  CREATE INDEX IF NOT EXISTS idx_ledger_records_supersedes ON ledger_records(supersedes);

  CREATE TABLE IF NOT EXISTS ledger_heads (
    partition_id TEXT PRIMARY KEY,
    head_hash TEXT NOT NULL,
    sequence INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS ledger_anchors (
    partition_id TEXT NOT NULL,
    period TEXT NOT NULL,
    root_hash TEXT NOT NULL,
    record_count INTEGER NOT NULL,
    created_at TEXT NOT NULL,
    PRIMARY KEY (partition_id, period)
  );

  CREATE TABLE IF NOT EXISTS record_annotations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    record_id TEXT NOT NULL,
    fields_json TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_record_annotations_record ON record_annotations(record_id);
`;

const APPEND_ONLY_TABLES: Array<{ table: string; trigger: string }> = [
  { table: 'ledger_records', trigger: 'record' },
  { table: 'ledger_anchors', trigger: 'anchor' },
  { table: 'record_annotations', trigger: 'annotation' }
];

function appendOnlyTriggers(): string {
  return APPEND_ONLY_TABLES.map(
    ({ table, trigger }) => `
  CREATE TRIGGER IF NOT EXISTS prevent_${trigger}_update
  BEFORE UPDATE ON ${table}
  BEGIN
    SELECT RAISE(ABORT, 'append-only: UPDATE not allowed on ${table}');
  END;

  CREATE TRIGGER IF NOT EXISTS prevent_${trigger}_delete
  BEFORE DELETE ON ${table}
  BEGIN
    SELECT RAISE(ABORT, 'append-only: DELETE not allowed on ${table}');
  END;`
  ).join('\n');
}

function toRecord(row: RecordRow): LedgerRecord {
  return {
    id: row.id,
    partition: row.partition_id,
    sequence: row.sequence,
    salt: row.salt,
    previousHash: row.previous_hash,
    recordHash: row.record_hash,
    supersedes: row.supersedes,
    createdAt: row.created_at,
    ...decodeStoredPayload(row.payload_json)
  };
}

function toAnchor(row: AnchorRow): MerkleAnchor {
  return {
    partition: row.partition_id,
    period: row.period,
    rootHash: row.root_hash,
    recordCount: row.record_count,
    createdAt: row.created_at
  };
}

export class SQLiteLedgerStore implements LedgerStore {
  readonly backend: StoreBackend = 'SQLITE';

  private db: Database.Database | null = null;
  private dbPath: string;
  private walMode: boolean;
  private busyTimeout: number;

  constructor(config: SQLiteLedgerStoreConfig) {
    this.dbPath = config.dbPath;
    this.walMode = config.walMode !== false;
    this.busyTimeout = config.busyTimeout ?? 5000;
  }

  async initialize(): Promise<void> {
    if (this.db) return;

    await fs.mkdir(path.dirname(this.dbPath), { recursive: true });

    const db = new Database(this.dbPath);
    if (this.walMode) {
      db.pragma('journal_mode = WAL');
    }
    db.pragma(`busy_timeout = ${this.busyTimeout}`);
    db.exec(SCHEMA);
    db.exec(appendOnlyTriggers());

    this.db = db;
    logger.debug('store opened', { path: this.dbPath, wal: this.walMode });
  }

  async shutdown(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  async getHead(partition: string): Promise<ChainHead | null> {
    const row = this.readHead(this.connection(), partition);
    return row ? { partition: row.partition_id, headHash: row.head_hash, sequence: row.sequence } : null;
  }

  async commitRecord(record: LedgerRecord, expectedHead: string | null, annotation?: AnnotationEntry): Promise<void> {
    assertPartition(record.partition);
    const db = this.connection();

    const commit = db.transaction(() => {
      const head = this.readHead(db, record.partition);
      const actualHead = head ? head.head_hash : null;
      const nextSequence = (head ? head.sequence : 0) + 1;

      if (
        actualHead !== expectedHead ||
        record.previousHash !== actualHead ||
        record.sequence !== nextSequence
      ) {
        throw new ChainHeadConflictError(record.partition, expectedHead, actualHead);
      }

      const collision = db
        .prepare<[string, string], { id: string }>(
          'SELECT id FROM ledger_records WHERE partition_id = ? AND record_hash = ?'
        )
        .get(record.partition, record.recordHash);
      if (collision) {
        throw new RecordHashCollisionError(record.partition, record.recordHash);
      }

      const period = periodOf(record.createdAt);
      if (this.hasAnchor(db, record.partition, period)) {
        throw new PeriodAlreadyAnchoredError(record.partition, period);
      }

      db.prepare(`INSERT INTO ledger_records (${RECORD_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`).run(
        record.id,
        record.partition,
        record.sequence,
        canonicalString(record.payload),
        record.salt,
        record.previousHash,
        record.recordHash,
        record.supersedes,
        record.createdAt
      );

      db.prepare(
        `INSERT INTO ledger_heads (partition_id, head_hash, sequence) VALUES (?, ?, ?)
         ON CONFLICT(partition_id) DO UPDATE SET head_hash = excluded.head_hash, sequence = excluded.sequence`
      ).run(record.partition, record.recordHash, record.sequence);

      if (annotation) {
        this.insertAnnotation(db, annotation);
      }
    });

    commit.immediate();
  }

  async getRecord(recordId: string): Promise<LedgerRecord | null> {
    const row = this.connection()
      .prepare<[string], RecordRow>(`SELECT ${RECORD_COLUMNS} FROM ledger_records WHERE id = ?`)
      .get(recordId);
    return row ? toRecord(row) : null;
  }

  async listRecords(partition: string, range: RecordRange = {}): Promise<LedgerRecord[]> {
    const rows = this.connection()
      .prepare<[string, number, number], RecordRow>(
        `SELECT ${RECORD_COLUMNS} FROM ledger_records
         WHERE partition_id = ? AND sequence >= ? AND sequence <= ?
         ORDER BY sequence ASC`
      )
      .all(partition, range.fromSequence ?? 1, range.toSequence ?? Number.MAX_SAFE_INTEGER);
    return rows.map(toRecord);
  }

  async listRecordsCreatedBetween(partition: string, start: string, end: string): Promise<LedgerRecord[]> {
    const rows = this.connection()
      .prepare<[string, string, string], RecordRow>(
        `SELECT ${RECORD_COLUMNS} FROM ledger_records
         WHERE partition_id = ? AND created_at >= ? AND created_at < ?
         ORDER BY sequence ASC`
      )
      .all(partition, start, end);
    return rows.map(toRecord);
  }

  async findSuccessor(recordId: string): Promise<LedgerRecord | null> {
    const row = this.connection()
      .prepare<[string], RecordRow>(
        `SELECT ${RECORD_COLUMNS} FROM ledger_records WHERE supersedes = ? ORDER BY sequence ASC LIMIT 1`
      )
      .get(recordId);
    return row ? toRecord(row) : null;
  }

  async listPartitions(): Promise<string[]> {
    const rows = this.connection()
      .prepare<[], { partition_id: string }>(
        'SELECT DISTINCT partition_id FROM ledger_records ORDER BY partition_id ASC'
      )
      .all();
    return rows.map(row => row.partition_id);
  }

  async listPeriods(partition: string): Promise<string[]> {
    const rows = this.connection()
      .prepare<[string], { period: string }>(
        `SELECT DISTINCT substr(created_at, 1, 10) AS period FROM ledger_records
         WHERE partition_id = ? ORDER BY period ASC`
      )
      .all(partition);
    return rows.map(row => row.period);
  }

  async getAnchor(partition: string, period: string): Promise<MerkleAnchor | null> {
    const row = this.connection()
      .prepare<[string, string], AnchorRow>(
        'SELECT * FROM ledger_anchors WHERE partition_id = ? AND period = ?'
      )
      .get(partition, period);
    return row ? toAnchor(row) : null;
  }

  async insertAnchor(anchor: MerkleAnchor): Promise<boolean> {
    const db = this.connection();
    const insert = db.transaction((): boolean => {
      if (this.hasAnchor(db, anchor.partition, anchor.period)) return false;

      const { start, end } = periodBounds(anchor.period);
      const row = db
        .prepare<[string, string, string], { count: number }>(
          `SELECT COUNT(*) AS count FROM ledger_records
           WHERE partition_id = ? AND created_at >= ? AND created_at < ?`
        )
        .get(anchor.partition, start, end);
      const count = row ? row.count : 0;
      if (count !== anchor.recordCount) {
        throw new AnchorPeriodChangedError(anchor.partition, anchor.period, anchor.recordCount, count);
      }

      const result = db
        .prepare(
          `INSERT INTO ledger_anchors (partition_id, period, root_hash, record_count, created_at)
           VALUES (?, ?, ?, ?, ?)
           ON CONFLICT(partition_id, period) DO NOTHING`
        )
        .run(anchor.partition, anchor.period, anchor.rootHash, anchor.recordCount, anchor.createdAt);
      return result.changes === 1;
    });
    return insert.immediate();
  }

  async listAnchors(partition: string): Promise<MerkleAnchor[]> {
    const rows = this.connection()
      .prepare<[string], AnchorRow>('SELECT * FROM ledger_anchors WHERE partition_id = ? ORDER BY period ASC')
      .all(partition);
    return rows.map(toAnchor);
  }

  async appendAnnotation(entry: AnnotationEntry): Promise<void> {
    this.insertAnnotation(this.connection(), entry);
  }

  async listAnnotations(recordId: string): Promise<AnnotationEntry[]> {
    const rows = this.connection()
      .prepare<[string], AnnotationRow>(
        'SELECT record_id, fields_json, created_at FROM record_annotations WHERE record_id = ? ORDER BY id ASC'
      )
      .all(recordId);
    return rows.map(row => ({
      recordId: row.record_id,
      fields: parseCanonical(row.fields_json),
      createdAt: row.created_at
    }));
  }

  private insertAnnotation(db: Database.Database, entry: AnnotationEntry): void {
    db.prepare('INSERT INTO record_annotations (record_id, fields_json, created_at) VALUES (?, ?, ?)').run(
      entry.recordId,
      canonicalString(entry.fields),
      entry.createdAt
    );
  }

  private readHead(db: Database.Database, partition: string): HeadRow | undefined {
    return db
      .prepare<[string], HeadRow>('SELECT partition_id, head_hash, sequence FROM ledger_heads WHERE partition_id = ?')
      .get(partition);
  }

  private hasAnchor(db: Database.Database, partition: string, period: string): boolean {
    const row = db
      .prepare<[string, string], { period: string }>(
        'SELECT period FROM ledger_anchors WHERE partition_id = ? AND period = ?'
      )
      .get(partition, period);
    return row !== undefined;
  }

  private connection(): Database.Database {
    if (!this.db) throw new Error('Database not initialized');
    return this.db;
  }
}
