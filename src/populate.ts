import type { Permutation } from './permutation.js';

/** Marks a slot no node has claimed yet */
export const UNFILLED = -1;

function gcd(a: number, b: number): number {
  while (b !== 0) {
    [a, b] = [b, a % b];
  }
  return a;
}

function checkPermutation({ offset, skip }: Permutation, index: number, m: number): void {
  if (!Number.isInteger(offset) || offset < 0 || offset >= m) {
    throw new RangeError(`Permutation ${index} has offset ${offset}, expected 0..${m - 1}`);
  }
  if (!Number.isInteger(skip) || skip < 1 || skip > m - 1) {
    throw new RangeError(`Permutation ${index} has skip ${skip}, expected 1..${m - 1}`);
  }
  if (gcd(skip, m) !== 1) {
    throw new RangeError(`Permutation ${index} has skip ${skip}, which does not visit every slot of ${m}`);
  }
}

/**
 * Fills a table of `m` slots from node permutations.
 *
 * Nodes take turns in index order; on its turn a node claims the first slot
 * of its preference order that is still free. Filling stops as soon as all
 * `m` slots are claimed, which may be partway through a round.
 *
 * @returns Owner node index per slot; empty when there are no permutations
 * @throws {RangeError} If a permutation does not visit every slot exactly once
 */
export function populate(permutations: readonly Permutation[], m: number): Int32Array {
  const n = permutations.length;
  if (n === 0) {
    return new Int32Array(0);
  }
  permutations.forEach((permutation, i) => checkPermutation(permutation, i, m));

  const entry = new Int32Array(m).fill(UNFILLED);
  // Cursor per node, kept as the slot it will try next.
  const next = Int32Array.from(permutations, (p) => p.offset);

  let filled = 0;
  while (filled < m) {
    for (let i = 0; i < n; i++) {
      const { skip } = permutations[i];
      let slot = next[i];
      while (entry[slot] !== UNFILLED) {
        slot = (slot + skip) % m;
      }

      entry[slot] = i;
      next[i] = (slot + skip) % m;

      if (++filled === m) break;
    }
  }

  return entry;
}
