#!/usr/bin/env ts-node
/**
 * Merkle Root Calculator
 *
 * Hashes each leaf string, then prints the incremental and batch root for
 * every prefix and checks that they agree.
 *
 * Usage:
 *   npm run root
 *   npm run root -- --algorithm sha3-256 alice bob carol
 *   npm run root -- alice -- --leaf-with-dashes
 *
 * Defaults to the leaves a..n under sha256. Exits 1 on any mismatch.
 */

import { IncrementalMerkleTree, computeMerkleRoot, getHashFunction } from '../src/merkle';
import { parseRootArgs } from './rootArgs';

const DEFAULT_LEAVES = 'abcdefghijklmn'.split('');

function main(): number {
  const parsed = parseRootArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(parsed.error);
    return 1;
  }

  const { algorithm, leaves: leafArgs } = parsed.args;
  const hashFn = getHashFunction(algorithm);
  if (!hashFn) {
    console.error(`Unknown hash algorithm: ${algorithm}`);
    return 1;
  }

  const data = leafArgs.length > 0 ? leafArgs : DEFAULT_LEAVES;
  const leaves = data.map(d => hashFn.hash(d));
  const tree = IncrementalMerkleTree.create(hashFn);
  let mismatches = 0;

  console.log(`Algorithm: ${hashFn.algorithm}, leaves: ${data.length}`);
  leaves.forEach((leaf, i) => {
    const incremental = tree.feed(leaf);
    const batch = computeMerkleRoot(hashFn, leaves.slice(0, i + 1));
    const ok = incremental.equals(batch);
    if (!ok) mismatches++;

    console.log(`  [${String(i + 1).padStart(3)}] ${hashFn.encode(incremental)} ${ok ? 'OK' : 'MISMATCH'}`);
    if (!ok) console.log(`        batch ${hashFn.encode(batch)}`);
  });

  console.log(`Root: ${hashFn.encode(tree.root)}`);
  console.log(`Slots: ${tree.slots.length}`);

  if (mismatches > 0) {
    console.error(`${mismatches} prefix root(s) disagree`);
    return 1;
  }
  return 0;
}

process.exit(main());
