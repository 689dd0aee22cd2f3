/**
 * Pluggable keyed hashing used for node permutations and key lookups
 * @module hasher
 */

/**
 * A streaming hash accumulator. Values are fed in as bytes and the digest is
 * read with {@link Hasher.finish}.
 */
export interface Hasher {
  write(bytes: Uint8Array): void;
  writeU8(value: number): void;
  writeU32(value: number): void;
  writeU64(value: bigint): void;
  /**
   * Returns the unsigned 64-bit digest of everything written so far.
   * Calling it does not reset or consume the accumulator.
   */
  finish(): bigint;
}

/**
 * Builds a fresh {@link Hasher} for every value that gets hashed
 */
export interface HashStrategy {
  buildHasher(): Hasher;
}

/**
 * Objects that know how to feed themselves into a hasher
 */
export interface Hash {
  hash(hasher: Hasher): void;
}

/**
 * Any value that can be used as a node or a lookup key
 */
export type Hashable =
  | string
  | number
  | bigint
  | boolean
  | Uint8Array
  | readonly Hashable[]
  | Hash;

const encoder = new TextEncoder();
const scratch = new DataView(new ArrayBuffer(8));

const MIN_I64 = -(1n << 63n);
const MAX_U64 = (1n << 64n) - 1n;

function isHashableArray(value: Hash | readonly Hashable[]): value is readonly Hashable[] {
  return Array.isArray(value);
}

function writeBigInt(hasher: Hasher, value: bigint): void {
  if (value < MIN_I64 || value > MAX_U64) {
    throw new RangeError(`BigInt value does not fit in 64 bits: ${value}`);
  }
  hasher.writeU64(BigInt.asUintN(64, value));
}

function writeNumber(hasher: Hasher, value: number): void {
  if (Number.isSafeInteger(value)) {
    hasher.writeU64(BigInt.asUintN(64, BigInt(value)));
    return;
  }
  scratch.setFloat64(0, value, true);
  hasher.writeU64(scratch.getBigUint64(0, true));
}

/**
 * Feeds a value into a hasher.
 *
 * Strings are written as their UTF-8 bytes followed by a `0xff` terminator.
 * Arrays and byte arrays are prefixed with their length as a 64-bit word.
 */
export function hashInto(value: Hashable, hasher: Hasher): void {
  if (typeof value === 'string') {
    hasher.write(encoder.encode(value));
    hasher.writeU8(0xff);
    return;
  }
  if (typeof value === 'number') {
    writeNumber(hasher, value);
    return;
  }
  if (typeof value === 'bigint') {
    writeBigInt(hasher, value);
    return;
  }
  if (typeof value === 'boolean') {
    hasher.writeU8(value ? 1 : 0);
    return;
  }

  if (value instanceof Uint8Array) {
    hasher.writeU64(BigInt(value.length));
    hasher.write(value);
    return;
  }

  if (isHashableArray(value)) {
    hasher.writeU64(BigInt(value.length));
    for (const item of value) {
      hashInto(item, hasher);
    }
    return;
  }

  value.hash(hasher);
}

/**
 * Hashes a value in a stream selected by `seed`.
 * The seed is written first as a little-endian 32-bit integer.
 *
 * @returns Unsigned 64-bit digest
 */
export function hashWithSeed(strategy: HashStrategy, value: Hashable, seed: number): bigint {
  const hasher = strategy.buildHasher();
  hasher.writeU32(seed);
  hashInto(value, hasher);
  return hasher.finish();
}
