/**
 * Record identity hash
 *
 * recordHash = SHA-256(canonicalPayload || salt || previousHash)
 *
 * salt and previousHash enter as raw bytes (16 and 32). Both are fixed length
 * and trail the variable-length payload, so the concatenation is unambiguous.
 * The genesis record hashes against 32 zero bytes.
 */

import { createHash, randomBytes } from 'crypto';
import { HashInputError } from './errors';

export const SALT_BYTES = 16;
export const DIGEST_BYTES = 32;

/**
 * Genesis hash (previous hash of the first record in a partition)
 */
export const GENESIS_HASH = '0'.repeat(DIGEST_BYTES * 2);

const SALT_PATTERN = new RegExp(`^[0-9a-f]{${SALT_BYTES * 2}}$`);
const DIGEST_PATTERN = new RegExp(`^[0-9a-f]{${DIGEST_BYTES * 2}}$`);

export function generateSalt(): string {
  return randomBytes(SALT_BYTES).toString('hex');
}

export function isDigestHex(value: unknown): value is string {
  return typeof value === 'string' && DIGEST_PATTERN.test(value);
}

export function isSaltHex(value: unknown): value is string {
  return typeof value === 'string' && SALT_PATTERN.test(value);
}

export function computeRecordHash(
  canonicalPayload: Buffer,
  salt: string,
  previousHash: string | null
): string {
  if (!isSaltHex(salt)) {
    throw new HashInputError(`Salt must be ${SALT_BYTES * 2} lowercase hex characters`);
  }
  if (previousHash !== null && !isDigestHex(previousHash)) {
    throw new HashInputError(`Previous hash must be ${DIGEST_BYTES * 2} lowercase hex characters or null`);
  }

  return createHash('sha256')
    .update(canonicalPayload)
    .update(Buffer.from(salt, 'hex'))
    .update(Buffer.from(previousHash ?? GENESIS_HASH, 'hex'))
    .digest('hex');
}

/**
 * Compute SHA256 hash of any string
 */
export function sha256(input: string | Buffer): string {
  return createHash('sha256').update(input).digest('hex');
}
