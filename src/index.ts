/**
 * maglev-table: Maglev consistent hashing lookup tables
 * @module maglev-table
 */

export { Maglev, build, DEFAULT_SLOTS_PER_NODE } from './maglev.js';
export type { JsonHashable, MaglevOptions, MaglevJSON } from './maglev.js';
export type { ConsistentHasher } from './consistent-hasher.js';

export { hashInto, hashWithSeed } from './hasher.js';
export type { Hash, Hashable, Hasher, HashStrategy } from './hasher.js';
export { SipHasher13, SipHash13Strategy, defaultHashStrategy } from './siphash.js';
export { MurmurHasher, MurmurHashStrategy } from './murmur.js';

export { OFFSET_SEED, SKIP_SEED, permutationOf, permutationSequence } from './permutation.js';
export type { Permutation } from './permutation.js';
export { populate, UNFILLED } from './populate.js';
export { isPrime, nextPrime } from './primes.js';

export { configureLogging, createLogger, getLogConfig, resetLogging } from './logger.js';
export type { LogConfig, LogFields, LogLevel, Logger } from './logger.js';
