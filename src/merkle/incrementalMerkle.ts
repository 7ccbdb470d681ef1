import { Digest, HashAlgorithm, HashFunction, assertAlgorithm, hashPair } from './hash';

/**
 * Merkle root accumulator that takes one leaf at a time.
 *
 * Keeps one slot per tree level. A non-zero slot holds a left sibling still
 * waiting for its right half; the zero digest marks an empty slot. Feeding a
 * leaf works like incrementing a binary counter: completed pairs carry upward
 * and reset their slot, a lone value is stored and stops the carry. Above the
 * carry the walk keeps going without touching any slot, padding each missing
 * sibling by duplication, so the returned root always equals
 * computeMerkleRoot over every leaf fed so far.
 *
 * After N leaves, slot `r` is non-zero exactly when bit `r` of N is set.
 *
 * Leaves and slots must come from the tree's own hash family.
 */
export class IncrementalMerkleTree<A extends HashAlgorithm = HashAlgorithm> {
  private readonly levelSlots: Digest<A>[];
  private currentRoot: Digest<A>;

  private constructor(private readonly hashFn: HashFunction<A>, slots: readonly Digest<A>[]) {
    slots.forEach(slot => assertAlgorithm(hashFn, slot));
    this.levelSlots = [...slots];
    this.currentRoot = hashFn.zero();
  }

  /**
   * Start an empty accumulator
   */
  static create<A extends HashAlgorithm>(hashFn: HashFunction<A>): IncrementalMerkleTree<A> {
    return new IncrementalMerkleTree(hashFn, []);
  }

  /**
   * Restore an accumulator from previously saved slots.
   *
   * The root is reset to the zero digest; callers that need the root across
   * a save point must store it alongside the slots.
   */
  static load<A extends HashAlgorithm>(
    hashFn: HashFunction<A>,
    slots: readonly Digest<A>[]
  ): IncrementalMerkleTree<A> {
    return new IncrementalMerkleTree(hashFn, slots);
  }

  get algorithm(): A {
    return this.hashFn.algorithm;
  }

  /**
   * Root returned by the most recent feed
   */
  get root(): Digest<A> {
    return this.currentRoot;
  }

  /**
   * Frozen copy of the slot vector, index = tree level
   */
  get slots(): readonly Digest<A>[] {
    return Object.freeze([...this.levelSlots]);
  }

  /**
   * Number of leaves the slots account for
   */
  get size(): number {
    return this.levelSlots.reduce(
      (count, slot, level) => (slot.isZero() ? count : count + 2 ** level),
      0
    );
  }

  /**
   * Add a leaf and return the new root
   */
  feed(leaf: Digest<A>): Digest<A> {
    assertAlgorithm(this.hashFn, leaf);

    let value = leaf;
    // True while the walk is still carrying a real insertion upward
    let authoritative = true;

    for (let level = 0; ; level++) {
      if (level >= this.levelSlots.length) {
        if (this.levelSlots.every(slot => slot.isZero())) {
          this.levelSlots.push(value);
        }
        break;
      }

      const sibling = this.levelSlots[level];

      if (sibling.isZero()) {
        if (authoritative) {
          this.levelSlots[level] = value;
        }
        value = hashPair(this.hashFn, value, value);
        authoritative = false;
      } else {
        if (authoritative) {
          this.levelSlots[level] = this.hashFn.zero();
        }
        value = hashPair(this.hashFn, sibling, value);
      }
    }

    this.currentRoot = value;
    return value;
  }
}
