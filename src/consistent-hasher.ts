import type { Hashable } from './hasher.js';

/**
 * A consistent hasher maps keys to nodes so that a change in the node set
 * remaps only about `K / n` of `K` keys.
 */
export interface ConsistentHasher<N> {
  /** All nodes, in the order they were given */
  readonly nodes: readonly N[];

  /** Number of slots in the lookup table */
  readonly capacity: number;

  /** Returns the node owning `key`, or undefined when there are no nodes */
  get(key: Hashable): N | undefined;
}
