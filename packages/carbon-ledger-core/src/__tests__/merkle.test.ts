import { createHash } from 'crypto';
import { HashInputError } from '../errors';
import { sha256 } from '../hasher';
import { buildMerkleProof, computeMerkleRoot, verifyMerkleProof } from '../merkle';

function leaf(hash: string): Buffer {
  return createHash('sha256').update(Buffer.concat([Buffer.from([0]), Buffer.from(hash, 'hex')])).digest();
}

function node(left: Buffer, right: Buffer): Buffer {
  return createHash('sha256').update(Buffer.concat([Buffer.from([1]), left, right])).digest();
}

const hashes = ['a', 'b', 'c', 'd', 'e', 'f', 'g'].map(letter => sha256(`record-${letter}`));

describe('computeMerkleRoot', () => {
  it('hashes a single leaf with the leaf prefix', () => {
    expect(computeMerkleRoot([hashes[0]])).toBe(leaf(hashes[0]).toString('hex'));
  });

  it('combines two leaves with the node prefix', () => {
    const expected = node(leaf(hashes[0]), leaf(hashes[1])).toString('hex');
    expect(computeMerkleRoot(hashes.slice(0, 2))).toBe(expected);
  });

  it('promotes an unpaired node instead of duplicating it', () => {
    const expected = node(node(leaf(hashes[0]), leaf(hashes[1])), leaf(hashes[2])).toString('hex');
    expect(computeMerkleRoot(hashes.slice(0, 3))).toBe(expected);
    expect(computeMerkleRoot(hashes.slice(0, 3))).not.toBe(
      computeMerkleRoot([hashes[0], hashes[1], hashes[2], hashes[2]])
    );
  });

  it('depends on leaf order', () => {
    expect(computeMerkleRoot([hashes[0], hashes[1]])).not.toBe(computeMerkleRoot([hashes[1], hashes[0]]));
  });

  it('rejects an empty list', () => {
    expect(() => computeMerkleRoot([])).toThrow(HashInputError);
  });

  it('rejects leaves that are not digests', () => {
    expect(() => computeMerkleRoot(['not-a-hash'])).toThrow(HashInputError);
  });
});

describe('inclusion proofs', () => {
  it('verifies every leaf for trees of one to seven leaves', () => {
    for (let size = 1; size <= hashes.length; size++) {
      const leaves = hashes.slice(0, size);
      const root = computeMerkleRoot(leaves);
      leaves.forEach((hash, index) => {
        expect(verifyMerkleProof(hash, buildMerkleProof(leaves, index), root)).toBe(true);
      });
    }
  });

  it('has no steps for a single leaf', () => {
    expect(buildMerkleProof([hashes[0]], 0)).toEqual([]);
  });

  it('skips levels where the node was promoted', () => {
    const leaves = hashes.slice(0, 3);
    const steps = buildMerkleProof(leaves, 2);
    expect(steps).toEqual([{ side: 'left', hash: node(leaf(hashes[0]), leaf(hashes[1])).toString('hex') }]);
  });

  it('fails for a different leaf or root', () => {
    const leaves = hashes.slice(0, 4);
    const root = computeMerkleRoot(leaves);
    const steps = buildMerkleProof(leaves, 1);
    expect(verifyMerkleProof(hashes[5], steps, root)).toBe(false);
    expect(verifyMerkleProof(hashes[1], steps, computeMerkleRoot(hashes.slice(0, 5)))).toBe(false);
  });

  it('fails when a step is malformed', () => {
    const leaves = hashes.slice(0, 2);
    const root = computeMerkleRoot(leaves);
    expect(verifyMerkleProof(hashes[0], [{ side: 'right', hash: 'zz' }], root)).toBe(false);
  });

  it('rejects out-of-range indices', () => {
    expect(() => buildMerkleProof(hashes.slice(0, 2), 2)).toThrow(RangeError);
    expect(() => buildMerkleProof(hashes.slice(0, 2), -1)).toThrow(RangeError);
  });
});
