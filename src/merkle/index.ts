// Hash capability
export {
  Digest,
  HashFunction,
  HashAlgorithm,
  HASH_ALGORITHMS,
  DIGEST_LENGTH,
  DIGEST_PREFIX,
  SHA256,
  SHA3_256,
  isHashAlgorithm,
  getHashFunction,
  assertAlgorithm,
  hashPair,
} from './hash';

// Batch root
export { computeMerkleRoot } from './merkleTree';

// Incremental accumulator
export { IncrementalMerkleTree } from './incrementalMerkle';
