import { Digest, HashFunction, SHA256, SHA3_256, hashPair } from '../hash';
import { computeMerkleRoot } from '../merkleTree';

const leavesOf = (data: string[]): Digest<'sha256'>[] => data.map(d => SHA256.hash(d));

describe('computeMerkleRoot', () => {
  it('should return the zero digest for an empty list', () => {
    const root = computeMerkleRoot(SHA256, []);
    expect(root.isZero()).toBe(true);
    expect(root.algorithm).toBe('sha256');
  });

  it('should return the leaf itself for a single leaf', () => {
    const leaf = SHA256.hash('only-one');
    expect(computeMerkleRoot(SHA256, [leaf])).toBe(leaf);
  });

  it('should hash two leaves together', () => {
    const [a, b] = leavesOf(['a', 'b']);
    expect(computeMerkleRoot(SHA256, [a, b]).equals(hashPair(SHA256, a, b))).toBe(true);
  });

  it('should pair the last of three leaves with itself', () => {
    const [a, b, c] = leavesOf(['a', 'b', 'c']);
    const expected = hashPair(SHA256, hashPair(SHA256, a, b), hashPair(SHA256, c, c));
    expect(computeMerkleRoot(SHA256, [a, b, c]).equals(expected)).toBe(true);
  });

  it('should duplicate odd nodes on upper levels too', () => {
    const [a, b, c, d, e] = leavesOf(['a', 'b', 'c', 'd', 'e']);
    const left = hashPair(SHA256, hashPair(SHA256, a, b), hashPair(SHA256, c, d));
    const ee = hashPair(SHA256, e, e);
    const right = hashPair(SHA256, ee, ee);
    expect(computeMerkleRoot(SHA256, [a, b, c, d, e]).equals(hashPair(SHA256, left, right))).toBe(true);
  });

  it('should equal the root of the list with its last leaf duplicated', () => {
    for (const count of [3, 5, 7, 11, 13]) {
      const leaves = leavesOf(Array.from({ length: count }, (_, i) => `leaf-${i}`));
      const padded = [...leaves, leaves[leaves.length - 1]];
      expect(computeMerkleRoot(SHA256, leaves).equals(computeMerkleRoot(SHA256, padded))).toBe(true);
    }
  });

  it('should not modify the input list', () => {
    const leaves = leavesOf(['a', 'b', 'c']);
    const copy = [...leaves];
    computeMerkleRoot(SHA256, leaves);
    expect(leaves).toHaveLength(3);
    leaves.forEach((leaf, i) => expect(leaf).toBe(copy[i]));
  });

  it('should produce deterministic root', () => {
    const leaves = leavesOf(['a', 'b', 'c']);
    expect(computeMerkleRoot(SHA256, leaves).equals(computeMerkleRoot(SHA256, leaves))).toBe(true);
  });

  it('should produce different root for different order', () => {
    const root1 = computeMerkleRoot(SHA256, leavesOf(['a', 'b', 'c']));
    const root2 = computeMerkleRoot(SHA256, leavesOf(['b', 'a', 'c']));
    expect(root1.equals(root2)).toBe(false);
  });

  it('should produce different roots under different hash families', () => {
    const data = ['a', 'b', 'c', 'd'];
    const sha2Root = computeMerkleRoot(SHA256, data.map(d => SHA256.hash(d)));
    const sha3Root = computeMerkleRoot(SHA3_256, data.map(d => SHA3_256.hash(d)));
    expect(SHA256.encode(sha2Root)).not.toBe(SHA3_256.encode(sha3Root));
  });

  it('should tag the root with the hash family', () => {
    expect(computeMerkleRoot(SHA3_256, [SHA3_256.hash('a'), SHA3_256.hash('b')]).algorithm).toBe('sha3-256');
    expect(computeMerkleRoot(SHA3_256, []).algorithm).toBe('sha3-256');
  });

  it('should reject leaves from another hash family', () => {
    const hashFn: HashFunction = SHA256;
    expect(() => computeMerkleRoot(hashFn, [SHA3_256.hash('a')])).toThrow(
      'Expected a sha256 digest, got sha3-256'
    );
    expect(() => computeMerkleRoot(hashFn, [SHA256.hash('a'), SHA3_256.hash('b')])).toThrow(
      'Expected a sha256 digest, got sha3-256'
    );
  });

  it('should handle larger trees', () => {
    const leaves = leavesOf(Array.from({ length: 1000 }, (_, i) => `leaf-${i}`));
    const root = computeMerkleRoot(SHA256, leaves);
    expect(root.isZero()).toBe(false);
    expect(SHA256.encode(root)).toMatch(/^0x[0-9a-f]{64}$/);
  });
});
