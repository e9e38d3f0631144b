/**
 * Binary Merkle tree over record hashes
 *
 * leaf  = SHA-256(0x00 || recordHash)
 * node  = SHA-256(0x01 || left || right)
 *
 * An unpaired node at the end of a level is promoted unchanged; nothing is
 * duplicated, so [a, b, c] and [a, b, c, c] have different roots.
 */

import { createHash } from 'crypto';
import { HashInputError } from './errors';
import { isDigestHex } from './hasher';
import { MerkleProofStep } from './types';

const LEAF_PREFIX = Buffer.from([0x00]);
const NODE_PREFIX = Buffer.from([0x01]);

function hashLeaf(recordHash: string): Buffer {
  if (!isDigestHex(recordHash)) {
    throw new HashInputError(`Merkle leaf is not a SHA-256 hex digest: ${recordHash}`);
  }
  return createHash('sha256').update(LEAF_PREFIX).update(Buffer.from(recordHash, 'hex')).digest();
}

function hashNode(left: Buffer, right: Buffer): Buffer {
  return createHash('sha256').update(NODE_PREFIX).update(left).update(right).digest();
}

function nextLevel(level: Buffer[]): Buffer[] {
  const parents: Buffer[] = [];
  for (let i = 0; i < level.length; i += 2) {
    const left = level[i];
    const right = level[i + 1];
    parents.push(right === undefined ? left : hashNode(left, right));
  }
  return parents;
}

/**
 * Root over record hashes in the given order. Throws on an empty list: an
 * empty period has no anchor.
 */
export function computeMerkleRoot(recordHashes: readonly string[]): string {
  if (recordHashes.length === 0) {
    throw new HashInputError('Cannot compute a Merkle root over zero leaves');
  }

  let level = recordHashes.map(hashLeaf);
  while (level.length > 1) {
    level = nextLevel(level);
  }
  return level[0].toString('hex');
}

/**
 * Sibling path from leaf `index` to the root.
 */
export function buildMerkleProof(recordHashes: readonly string[], index: number): MerkleProofStep[] {
  if (!Number.isInteger(index) || index < 0 || index >= recordHashes.length) {
    throw new RangeError(`Leaf index ${index} out of range (0..${recordHashes.length - 1})`);
  }

  const steps: MerkleProofStep[] = [];
  let level = recordHashes.map(hashLeaf);
  let position = index;

  while (level.length > 1) {
    const isRight = position % 2 === 1;
    const sibling = level[isRight ? position - 1 : position + 1];
    // promoted nodes have no sibling at this level
    if (sibling !== undefined) {
      steps.push({ side: isRight ? 'left' : 'right', hash: sibling.toString('hex') });
    }
    level = nextLevel(level);
    position = Math.floor(position / 2);
  }

  return steps;
}

export function verifyMerkleProof(
  recordHash: string,
  steps: readonly MerkleProofStep[],
  expectedRoot: string
): boolean {
  if (!isDigestHex(recordHash) || !isDigestHex(expectedRoot)) return false;

  let current = hashLeaf(recordHash);
  for (const step of steps) {
    if (!isDigestHex(step.hash)) return false;
    const sibling = Buffer.from(step.hash, 'hex');
    current = step.side === 'left' ? hashNode(sibling, current) : hashNode(current, sibling);
  }
  return current.toString('hex') === expectedRoot;
}
