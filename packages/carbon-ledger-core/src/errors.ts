/**
 * Ledger error taxonomy
 *
 * Every failure raised by the ledger carries a stable `code` so callers can
 * map it without matching on messages.
 */

import { TamperDetected } from './types';

export abstract class LedgerError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Payload value cannot be serialized deterministically.
 */
export class CanonicalizationError extends LedgerError {
  readonly code = 'CANONICALIZATION_FAILED';

  constructor(
    message: string,
    public readonly path: string
  ) {
    super(`${message} at ${path}`);
  }
}

export class PayloadValidationError extends LedgerError {
  readonly code = 'PAYLOAD_INVALID';
}

export class HashInputError extends LedgerError {
  readonly code = 'HASH_INPUT_INVALID';
}

/**
 * Another writer advanced the partition head between read and commit.
 */
export class ChainHeadConflictError extends LedgerError {
  readonly code = 'CHAIN_HEAD_CONFLICT';

  constructor(
    public readonly partition: string,
    public readonly expectedHead: string | null,
    public readonly actualHead: string | null
  ) {
    super(
      `Chain head of partition "${partition}" moved: expected ${shortHash(expectedHead)}, found ${shortHash(actualHead)}`
    );
  }
}

export class RecordHashCollisionError extends LedgerError {
  readonly code = 'RECORD_HASH_COLLISION';

  constructor(
    public readonly partition: string,
    public readonly recordHash: string
  ) {
    super(`Record hash ${recordHash} already exists in partition "${partition}"`);
  }
}

export class RecordNotFoundError extends LedgerError {
  readonly code = 'RECORD_NOT_FOUND';

  constructor(public readonly recordId: string) {
    super(`Record not found: ${recordId}`);
  }
}

export class RecordAlreadySupersededError extends LedgerError {
  readonly code = 'RECORD_ALREADY_SUPERSEDED';

  constructor(
    public readonly recordId: string,
    public readonly supersededBy: string
  ) {
    super(`Record ${recordId} is already superseded by ${supersededBy}; amend the latest revision instead`);
  }
}

/**
 * The record is dated inside a period that was anchored before it could be
 * committed. Retried with a fresh clock reading.
 */
export class PeriodAlreadyAnchoredError extends LedgerError {
  readonly code = 'PERIOD_ALREADY_ANCHORED';

  constructor(
    public readonly partition: string,
    public readonly period: string
  ) {
    super(`Period ${period} of partition "${partition}" is already anchored; it takes no new records`);
  }
}

/**
 * Records landed in the period between reading it and inserting its anchor.
 */
export class AnchorPeriodChangedError extends LedgerError {
  readonly code = 'ANCHOR_PERIOD_CHANGED';

  constructor(
    public readonly partition: string,
    public readonly period: string,
    public readonly expectedCount: number,
    public readonly actualCount: number
  ) {
    super(
      `Period ${period} of partition "${partition}" holds ${actualCount} records, not the ${expectedCount} being anchored`
    );
  }
}

export class AnchorPeriodAlreadyClosedError extends LedgerError {
  readonly code = 'ANCHOR_PERIOD_ALREADY_CLOSED';

  constructor(
    public readonly partition: string,
    public readonly period: string,
    detail: string
  ) {
    super(`Period ${period} of partition "${partition}" is already anchored with different contents (${detail})`);
  }
}

export class AnchorPeriodOpenError extends LedgerError {
  readonly code = 'ANCHOR_PERIOD_OPEN';

  constructor(public readonly period: string) {
    super(`Period ${period} has not closed yet`);
  }
}

export class EmptyAnchorPeriodError extends LedgerError {
  readonly code = 'ANCHOR_PERIOD_EMPTY';

  constructor(
    public readonly partition: string,
    public readonly period: string
  ) {
    super(`No records in period ${period} of partition "${partition}"`);
  }
}

export class AnchorNotFoundError extends LedgerError {
  readonly code = 'ANCHOR_NOT_FOUND';

  constructor(
    public readonly partition: string,
    public readonly period: string
  ) {
    super(`No anchor for period ${period} of partition "${partition}"`);
  }
}

export class TamperDetectedError extends LedgerError {
  readonly code = 'TAMPER_DETECTED';

  constructor(public readonly finding: TamperDetected) {
    super(`Tamper detected (${finding.reason}): ${finding.detail}`);
  }
}

/**
 * Fail-closed configuration error, raised at startup.
 */
export class StoreMisconfiguredError extends LedgerError {
  readonly code = 'STORE_MISCONFIGURED';
}

export class StoreLockTimeoutError extends LedgerError {
  readonly code = 'STORE_LOCK_TIMEOUT';

  constructor(
    public readonly lockPath: string,
    timeoutMs: number
  ) {
    super(`Could not acquire ${lockPath} within ${timeoutMs}ms`);
  }
}

export function shortHash(hash: string | null): string {
  return hash === null ? 'genesis' : `${hash.substring(0, 12)}...`;
}
