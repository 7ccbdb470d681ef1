import * as crypto from 'crypto';

/**
 * Supported hash families. Both produce 32-byte digests.
 */
export type HashAlgorithm = 'sha256' | 'sha3-256';

export const HASH_ALGORITHMS: readonly HashAlgorithm[] = ['sha256', 'sha3-256'];

export const DIGEST_LENGTH = 32;
export const DIGEST_PREFIX = '0x';

const ENCODED_DIGEST = /^0x[0-9a-f]{64}$/;

/**
 * Fixed-size hash output.
 *
 * The all-zero digest doubles as the "empty" value: it is the root of an
 * empty leaf list and marks an unused slot in the incremental tree.
 */
export class Digest<A extends HashAlgorithm = HashAlgorithm> {
  private readonly bytes: Uint8Array;

  constructor(readonly algorithm: A, bytes: Uint8Array) {
    if (bytes.length !== DIGEST_LENGTH) {
      throw new Error(`Digest must be ${DIGEST_LENGTH} bytes, got ${bytes.length}`);
    }
    this.bytes = Uint8Array.from(bytes);
  }

  isZero(): boolean {
    return this.bytes.every(b => b === 0);
  }

  equals(other: Digest): boolean {
    return (
      this.algorithm === other.algorithm &&
      Buffer.from(this.bytes).equals(Buffer.from(other.bytes))
    );
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  /**
   * Canonical encoding: "0x" followed by lowercase hex
   */
  toString(): string {
    return DIGEST_PREFIX + Buffer.from(this.bytes).toString('hex');
  }
}

/**
 * Hash capability shared by the batch and incremental trees.
 *
 * `encode` is not only for display: parent nodes are computed by hashing the
 * UTF-8 bytes of `encode(left) + encode(right)`.
 */
export interface HashFunction<A extends HashAlgorithm = HashAlgorithm> {
  readonly algorithm: A;
  hash(data: Uint8Array | string): Digest<A>;
  encode(digest: Digest<A>): string;
  decode(encoded: string): Digest<A>;
  zero(): Digest<A>;
}

function createNodeHashFunction<A extends HashAlgorithm>(algorithm: A): HashFunction<A> {
  const zero = new Digest(algorithm, new Uint8Array(DIGEST_LENGTH));

  const hashFn: HashFunction<A> = {
    algorithm,
    hash: data => new Digest(algorithm, crypto.createHash(algorithm).update(data).digest()),
    encode: digest => digest.toString(),
    decode: encoded => {
      if (!ENCODED_DIGEST.test(encoded)) {
        throw new Error(`Invalid ${algorithm} digest encoding: ${encoded}`);
      }
      return new Digest(algorithm, Buffer.from(encoded.slice(DIGEST_PREFIX.length), 'hex'));
    },
    zero: () => zero,
  };

  return Object.freeze(hashFn);
}

export const SHA256 = createNodeHashFunction('sha256');
export const SHA3_256 = createNodeHashFunction('sha3-256');

const HASH_FUNCTIONS: { [A in HashAlgorithm]: HashFunction<A> } = {
  sha256: SHA256,
  'sha3-256': SHA3_256,
};

export function isHashAlgorithm(name: string): name is HashAlgorithm {
  return (HASH_ALGORITHMS as readonly string[]).includes(name);
}

/**
 * Look up a hash function by algorithm name
 *
 * @returns undefined for unsupported names
 */
export function getHashFunction(name: string): HashFunction | undefined {
  return isHashAlgorithm(name) ? HASH_FUNCTIONS[name] : undefined;
}

/**
 * Throws when a digest was produced by a different hash family than hashFn
 */
export function assertAlgorithm(hashFn: Pick<HashFunction, 'algorithm'>, digest: Digest): void {
  if (digest.algorithm !== hashFn.algorithm) {
    throw new Error(`Expected a ${hashFn.algorithm} digest, got ${digest.algorithm}`);
  }
}

/**
 * Hash two child digests together to create the parent digest.
 * Position matters: hashPair(a, b) != hashPair(b, a)
 */
export function hashPair<A extends HashAlgorithm>(
  hashFn: HashFunction<A>,
  left: Digest<A>,
  right: Digest<A>
): Digest<A> {
  return hashFn.hash(hashFn.encode(left) + hashFn.encode(right));
}
