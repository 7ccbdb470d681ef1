import {
  Digest,
  HashAlgorithm,
  HashFunction,
  HASH_ALGORITHMS,
  IncrementalMerkleTree,
  getHashFunction,
} from '../merkle';

export const DEFAULT_MAX_LEAVES_PER_REQUEST = 1024;

// Slot r stands for 2^r leaves; beyond this the count is no longer a safe integer.
export const MAX_SLOT_LEVELS = 53;

/**
 * One long-lived accumulator per hash family.
 *
 * `root` is tracked here rather than read from the tree: restoring from
 * saved slots resets the tree's own root, so the caller-supplied root has to
 * live alongside it.
 */
export interface Accumulator {
  hashFn: HashFunction;
  tree: IncrementalMerkleTree;
  root: Digest;
}

/**
 * API state container for the HTTP server
 */
export interface ApiState {
  accumulators: Map<HashAlgorithm, Accumulator>;

  // Upper bound on leaves accepted in a single request body
  maxLeavesPerRequest: number;
}

export interface ApiStateOptions {
  maxLeavesPerRequest?: number;
}

/**
 * Create an empty accumulator for a hash function
 */
export function createAccumulator(hashFn: HashFunction): Accumulator {
  return {
    hashFn,
    tree: IncrementalMerkleTree.create(hashFn),
    root: hashFn.zero(),
  };
}

/**
 * Create initial API state with an empty accumulator for every supported family
 */
export function createApiState(options: ApiStateOptions = {}): ApiState {
  const accumulators = new Map<HashAlgorithm, Accumulator>();
  for (const algorithm of HASH_ALGORITHMS) {
    const hashFn = getHashFunction(algorithm);
    if (hashFn) {
      accumulators.set(algorithm, createAccumulator(hashFn));
    }
  }

  return {
    accumulators,
    maxLeavesPerRequest: options.maxLeavesPerRequest ?? DEFAULT_MAX_LEAVES_PER_REQUEST,
  };
}

/**
 * Hash each leaf and feed it into the accumulator, in order
 *
 * @returns Root after each leaf
 */
export function appendLeaves(accumulator: Accumulator, leaves: string[]): Digest[] {
  const roots = leaves.map(leaf => accumulator.tree.feed(accumulator.hashFn.hash(leaf)));
  if (roots.length > 0) {
    accumulator.root = roots[roots.length - 1];
  }
  return roots;
}

/**
 * Check that slots have the shape of a saved accumulator: empty, or at most
 * MAX_SLOT_LEVELS long with a non-zero top slot
 *
 * @returns Reason the slots are rejected, or undefined when they are valid
 */
export function checkSavedSlots(slots: readonly Digest[]): string | undefined {
  if (slots.length === 0) {
    return undefined;
  }
  if (slots.length > MAX_SLOT_LEVELS) {
    return `Too many slots: ${slots.length} (max ${MAX_SLOT_LEVELS})`;
  }
  if (slots[slots.length - 1].isZero()) {
    return 'Top slot must not be the zero digest';
  }
  return undefined;
}

/**
 * Replace the accumulator's tree with one loaded from saved slots
 */
export function restoreAccumulator(
  accumulator: Accumulator,
  slots: readonly Digest[],
  root?: Digest
): void {
  accumulator.tree = IncrementalMerkleTree.load(accumulator.hashFn, slots);
  accumulator.root = root ?? accumulator.tree.root;
}

/**
 * Drop all accumulated leaves
 */
export function resetAccumulator(accumulator: Accumulator): void {
  accumulator.tree = IncrementalMerkleTree.create(accumulator.hashFn);
  accumulator.root = accumulator.hashFn.zero();
}
