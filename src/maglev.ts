/**
 * Maglev lookup table
 * @module maglev
 */

import type { ConsistentHasher } from './consistent-hasher.js';
import { hashWithSeed, type HashStrategy, type Hashable } from './hasher.js';
import { createLogger } from './logger.js';
import { OFFSET_SEED, permutationOf } from './permutation.js';
import { populate } from './populate.js';
import { nextPrime } from './primes.js';
import { defaultHashStrategy } from './siphash.js';

const logger = createLogger('maglev');

/**
 * Table slots per node when no capacity is given
 */
export const DEFAULT_SLOTS_PER_NODE = 100;

/**
 * Configuration options for Maglev
 */
export interface MaglevOptions {
  /**
   * Requested table size, rounded up to the next prime.
   * Keep it the same across rebuilds: a different size reshuffles almost
   * every key.
   * @default 100 × number of nodes
   */
  capacity?: number;

  /**
   * Hash strategy for node permutations and keys
   * @default SipHash-1-3 with a zero key
   */
  hasher?: HashStrategy;
}

/**
 * Node types that survive a JSON round trip unchanged. Bigints, byte arrays
 * and {@link Hash} objects do not, and non-finite numbers come back as null.
 */
export type JsonHashable = string | number | boolean | readonly JsonHashable[];

/**
 * Serialized form of a table, as produced by {@link Maglev.toJSON}
 */
export interface MaglevJSON<N extends JsonHashable> {
  nodes: N[];
  capacity: number;
}

function resolveCapacity(requested: number | undefined, nodeCount: number): number {
  const capacity = requested ?? 0;
  if (!Number.isSafeInteger(capacity) || capacity < 0) {
    throw new RangeError(`Capacity must be a non-negative safe integer, got ${capacity}`);
  }
  if (nodeCount === 0) return 0;
  return nextPrime(capacity > 0 ? capacity : nodeCount * DEFAULT_SLOTS_PER_NODE);
}

/**
 * Maglev - consistent hashing over a prime-sized lookup table
 * @class
 *
 * @example
 * ```typescript
 * const table = new Maglev(['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday']);
 * table.get('alice'); // 'Friday'
 *
 * // Rebuild after a membership change with the same capacity
 * const next = Maglev.withCapacity(['Monday', 'Wednesday', 'Friday', 'Saturday', 'Sunday'], table.capacity);
 * next.get('alice'); // 'Friday'
 * ```
 */
export class Maglev<N extends Hashable> implements ConsistentHasher<N> {
  private readonly _nodes: readonly N[];
  private readonly lookup: Int32Array;
  private readonly hasher: HashStrategy;
  private readonly modulus: bigint;

  /**
   * Builds the lookup table for `nodes`
   * @param nodes - Nodes in priority order; duplicates count as separate nodes
   * @param options - Capacity and hash strategy
   * @throws {RangeError} If the capacity is not a non-negative safe integer
   */
  constructor(nodes: Iterable<N>, options: MaglevOptions = {}) {
    this._nodes = Object.freeze(Array.from(nodes));
    this.hasher = options.hasher ?? defaultHashStrategy;

    const n = this._nodes.length;
    const m = resolveCapacity(options.capacity, n);
    this.modulus = BigInt(m);

    if (n === 0) {
      this.lookup = new Int32Array(0);
      return;
    }
    if (m < n) {
      logger.warn('Capacity is smaller than the node count', { nodes: n, capacity: m });
    }

    const permutations = this._nodes.map((node) => permutationOf(node, m, this.hasher));
    this.lookup = populate(permutations, m);

    logger.debug('Lookup table populated', { nodes: n, capacity: m });
  }

  /**
   * Creates a table with the default capacity and hasher
   */
  static from<N extends Hashable>(nodes: Iterable<N>): Maglev<N> {
    return new Maglev(nodes);
  }

  static withCapacity<N extends Hashable>(nodes: Iterable<N>, capacity: number): Maglev<N> {
    return new Maglev(nodes, { capacity });
  }

  static withHasher<N extends Hashable>(nodes: Iterable<N>, hasher: HashStrategy): Maglev<N> {
    return new Maglev(nodes, { hasher });
  }

  static withCapacityAndHasher<N extends Hashable>(
    nodes: Iterable<N>,
    capacity: number,
    hasher: HashStrategy
  ): Maglev<N> {
    return new Maglev(nodes, { capacity, hasher });
  }

  /**
   * Recreates a table from {@link Maglev.toJSON} output.
   * The hash strategy is not serialized; pass the one the original used.
   * @throws {TypeError} If `json` does not have the serialized shape
   */
  static fromJSON<N extends JsonHashable>(json: MaglevJSON<N>, hasher?: HashStrategy): Maglev<N> {
    if (
      typeof json !== 'object' ||
      json === null ||
      !Array.isArray(json.nodes) ||
      typeof json.capacity !== 'number'
    ) {
      throw new TypeError('Invalid Maglev JSON: expected { nodes: [], capacity: number }');
    }
    return new Maglev(json.nodes, { capacity: json.capacity, hasher });
  }

  /**
   * The nodes in input order
   */
  get nodes(): readonly N[] {
    return this._nodes;
  }

  /**
   * Size of the lookup table, or 0 when there are no nodes
   */
  get capacity(): number {
    return this.lookup.length;
  }

  /**
   * Number of nodes, duplicates included
   */
  get size(): number {
    return this._nodes.length;
  }

  /**
   * Gets the node responsible for a key
   * @param key - Any hashable value; it need not share the node type
   * @returns The owning node, or undefined if the table has no nodes
   */
  get(key: Hashable): N | undefined {
    if (this.lookup.length === 0) {
      return undefined;
    }
    const slot = Number(hashWithSeed(this.hasher, key, OFFSET_SEED) % this.modulus);
    return this._nodes[this.lookup[slot]];
  }

  /**
   * Like {@link Maglev.get}, for callers that know the table has nodes
   * @throws {Error} If the table has no nodes
   */
  getOrThrow(key: Hashable): N {
    const node = this.get(key);
    if (node === undefined) {
      throw new Error('Maglev table has no nodes');
    }
    return node;
  }

  /**
   * Counts the slots each node owns, indexed like {@link Maglev.nodes}
   */
  slotCounts(): number[] {
    const counts = new Array<number>(this._nodes.length).fill(0);
    for (const owner of this.lookup) {
      counts[owner]++;
    }
    return counts;
  }

  /**
   * Returns a string summary of the table
   */
  toString(): string {
    return `Maglev(nodes=${this.size}, capacity=${this.capacity})`;
  }

  /**
   * Serializes the nodes and the capacity; together with the same hash
   * strategy they reproduce the table exactly
   */
  toJSON<T extends JsonHashable>(this: Maglev<T>): MaglevJSON<T> {
    return {
      nodes: [...this._nodes],
      capacity: this.capacity,
    };
  }
}

/**
 * Builds a Maglev table.
 *
 * @param nodes - Nodes in priority order
 * @param capacity - Requested table size; omit or pass 0 for 100 slots per node
 * @param hasher - Hash strategy, SipHash-1-3 by default
 */
export function build<N extends Hashable>(
  nodes: Iterable<N>,
  capacity?: number,
  hasher?: HashStrategy
): Maglev<N> {
  return new Maglev(nodes, { capacity, hasher });
}
