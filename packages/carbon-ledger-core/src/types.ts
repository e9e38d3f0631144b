/**
 * Carbon ledger domain types
 */

export type PayloadValue =
  | string
  | number
  | boolean
  | null
  | PayloadValue[]
  | { [field: string]: PayloadValue };

/**
 * Logical record payload: field name to value.
 */
export type FieldMap = { [field: string]: PayloadValue };

export interface LedgerRecord {
  id: string;
  partition: string;
  sequence: number; // 1-based within the partition
  payload: FieldMap;
  salt: string;
  previousHash: string | null; // null for the genesis record
  recordHash: string;
  supersedes: string | null;
  createdAt: string; // ISO-8601 UTC
  payloadError?: string; // set by stores when the stored payload no longer decodes
}

/**
 * Current tip of a partition's chain.
 */
export interface ChainHead {
  partition: string;
  headHash: string;
  sequence: number;
}

export interface MerkleAnchor {
  partition: string;
  period: string; // YYYY-MM-DD (UTC)
  rootHash: string;
  recordCount: number;
  createdAt: string;
}

export interface AnnotationEntry {
  recordId: string;
  fields: FieldMap;
  createdAt: string;
}

export type TamperReason =
  | 'hash_mismatch'
  | 'chain_break'
  | 'sequence_gap'
  | 'duplicate_hash'
  | 'supersedes_mismatch'
  | 'anchor_mismatch';

/**
 * A verification finding. Always reported to the caller, never downgraded.
 */
export interface TamperDetected {
  subject: 'record' | 'period';
  reason: TamperReason;
  recordId?: string;
  partition?: string;
  period?: string;
  detail: string;
}

export interface VerificationResult {
  ok: boolean;
  reason?: TamperReason;
  firstBrokenRecordId?: string;
  finding?: TamperDetected;
  checked: number; // records (or leaves) examined
}

export type MerkleSide = 'left' | 'right';

export interface MerkleProofStep {
  side: MerkleSide; // side the sibling sits on
  hash: string;
}

export interface InclusionProof {
  recordId: string;
  recordHash: string;
  partition: string;
  period: string;
  leafIndex: number;
  steps: MerkleProofStep[];
  rootHash: string;
}
