/**
 * Per-node slot permutations
 * @module permutation
 */

import { hashWithSeed, type HashStrategy, type Hashable } from './hasher.js';

/** Seed of the stream that places node offsets and lookup keys */
export const OFFSET_SEED = 0xdeadbabe;

/** Seed of the stream that picks each node's stride */
export const SKIP_SEED = 0xdeadbeef;

/**
 * A node's preference order over the table: slot `k` of the order is
 * `(offset + k * skip) % m`. Because `m` is prime and `skip` is in
 * `[1, m - 1]`, the order visits every slot exactly once.
 */
export interface Permutation {
  readonly offset: number;
  readonly skip: number;
}

/**
 * Derives the offset and skip of a node for a table of size `m`
 *
 * @throws {Error} If `m` is less than 2
 */
export function permutationOf(node: Hashable, m: number, strategy: HashStrategy): Permutation {
  if (m < 2) {
    throw new Error(`Table size must be at least 2, got ${m}`);
  }
  const size = BigInt(m);
  const offset = Number(hashWithSeed(strategy, node, OFFSET_SEED) % size);
  const skip = Number(hashWithSeed(strategy, node, SKIP_SEED) % (size - 1n)) + 1;
  return { offset, skip };
}

/**
 * Yields the full preference order of a permutation, `m` slots long
 */
export function* permutationSequence(permutation: Permutation, m: number): Generator<number, void, undefined> {
  let slot = permutation.offset;
  for (let k = 0; k < m; k++) {
    yield slot;
    slot = (slot + permutation.skip) % m;
  }
}
