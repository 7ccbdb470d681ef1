import { Digest, HashAlgorithm, HashFunction, assertAlgorithm, hashPair } from './hash';

/**
 * Compute the Merkle root of an ordered list of leaf digests.
 *
 * Tree structure:
 * - Leaves are used as given (hash them before calling)
 * - Internal nodes hash the canonical encodings of their children, left first
 * - If a level has an odd number of nodes, the last node is duplicated and
 *   paired with itself
 *
 * @param hashFn Hash family used for internal nodes
 * @param leaves Leaf digests from the same family, not modified
 * @returns Merkle root, or the zero digest for an empty list
 */
export function computeMerkleRoot<A extends HashAlgorithm>(
  hashFn: HashFunction<A>,
  leaves: readonly Digest<A>[]
): Digest<A> {
  if (leaves.length === 0) {
    return hashFn.zero();
  }

  leaves.forEach(leaf => assertAlgorithm(hashFn, leaf));

  let currentLevel = [...leaves];

  // Reduce to root
  while (currentLevel.length > 1) {
    if (currentLevel.length % 2 === 1) {
      currentLevel.push(currentLevel[currentLevel.length - 1]);
    }

    const nextLevel: Digest<A>[] = [];
    for (let i = 0; i < currentLevel.length; i += 2) {
      nextLevel.push(hashPair(hashFn, currentLevel[i], currentLevel[i + 1]));
    }

    currentLevel = nextLevel;
  }

  return currentLevel[0];
}
