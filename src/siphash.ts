/**
 * SipHash-1-3, the default keyed hash for lookup tables
 * @module siphash
 */

import type { HashStrategy, Hasher } from './hasher.js';

// State words are stored as [hi, lo] pairs of 32-bit halves.
const V0 = 0;
const V1 = 2;
const V2 = 4;
const V3 = 6;

function add(v: Uint32Array, a: number, b: number): void {
  const lo = v[a + 1] + v[b + 1];
  v[a] = v[a] + v[b] + (lo > 0xffffffff ? 1 : 0);
  v[a + 1] = lo;
}

function xor(v: Uint32Array, a: number, b: number): void {
  v[a] ^= v[b];
  v[a + 1] ^= v[b + 1];
}

/** Rotates left by 0 < bits < 32 */
function rotl(v: Uint32Array, a: number, bits: number): void {
  const hi = v[a];
  const lo = v[a + 1];
  v[a] = (hi << bits) | (lo >>> (32 - bits));
  v[a + 1] = (lo << bits) | (hi >>> (32 - bits));
}

function rotl32(v: Uint32Array, a: number): void {
  const hi = v[a];
  v[a] = v[a + 1];
  v[a + 1] = hi;
}

function sipRound(v: Uint32Array): void {
  add(v, V0, V1);
  rotl(v, V1, 13);
  xor(v, V1, V0);
  rotl32(v, V0);

  add(v, V2, V3);
  rotl(v, V3, 16);
  xor(v, V3, V2);

  add(v, V0, V3);
  rotl(v, V3, 21);
  xor(v, V3, V0);

  add(v, V2, V1);
  rotl(v, V1, 17);
  xor(v, V1, V2);
  rotl32(v, V2);
}

function compress(v: Uint32Array, hi: number, lo: number): void {
  v[V3] ^= hi;
  v[V3 + 1] ^= lo;
  sipRound(v);
  v[V0] ^= hi;
  v[V0 + 1] ^= lo;
}

function splitKey(key: bigint): [number, number] {
  const word = BigInt.asUintN(64, key);
  return [Number(word >> 32n), Number(word & 0xffffffffn)];
}

/**
 * Streaming SipHash-1-3 accumulator.
 *
 * Follows the reference construction: one compression round per 8-byte
 * word, three finalization rounds, little-endian words.
 */
export class SipHasher13 implements Hasher {
  private readonly state = new Uint32Array(8);
  private readonly tail = new Uint8Array(8);
  private ntail = 0;
  private length = 0;

  /**
   * @param k0 - First 64 bits of the key
   * @param k1 - Second 64 bits of the key
   */
  constructor(k0: bigint = 0n, k1: bigint = 0n) {
    const [k0hi, k0lo] = splitKey(k0);
    const [k1hi, k1lo] = splitKey(k1);
    const v = this.state;
    v[V0] = k0hi ^ 0x736f6d65;
    v[V0 + 1] = k0lo ^ 0x70736575;
    v[V1] = k1hi ^ 0x646f7261;
    v[V1 + 1] = k1lo ^ 0x6e646f6d;
    v[V2] = k0hi ^ 0x6c796765;
    v[V2 + 1] = k0lo ^ 0x6e657261;
    v[V3] = k1hi ^ 0x74656462;
    v[V3 + 1] = k1lo ^ 0x79746573;
  }

  write(bytes: Uint8Array): void {
    for (const byte of bytes) {
      this.push(byte);
    }
  }

  writeU8(value: number): void {
    this.push(value & 0xff);
  }

  writeU32(value: number): void {
    this.push(value & 0xff);
    this.push((value >>> 8) & 0xff);
    this.push((value >>> 16) & 0xff);
    this.push((value >>> 24) & 0xff);
  }

  writeU64(value: bigint): void {
    const [hi, lo] = splitKey(value);
    this.writeU32(lo);
    this.writeU32(hi);
  }

  finish(): bigint {
    const v = Uint32Array.from(this.state);
    const t = this.tail;

    // Final block: the pending tail bytes with the low byte of the total length on top.
    const lo = (t[0] | (t[1] << 8) | (t[2] << 16) | (t[3] << 24)) >>> 0;
    let hi = 0;
    for (let i = 4; i < this.ntail; i++) {
      hi |= t[i] << ((i - 4) * 8);
    }
    hi = (hi | ((this.length & 0xff) << 24)) >>> 0;
    compress(v, hi, lo);

    v[V2 + 1] ^= 0xff;
    sipRound(v);
    sipRound(v);
    sipRound(v);

    const outHi = (v[V0] ^ v[V1] ^ v[V2] ^ v[V3]) >>> 0;
    const outLo = (v[V0 + 1] ^ v[V1 + 1] ^ v[V2 + 1] ^ v[V3 + 1]) >>> 0;
    return (BigInt(outHi) << 32n) | BigInt(outLo);
  }

  private push(byte: number): void {
    const t = this.tail;
    t[this.ntail++] = byte;
    this.length++;
    if (this.ntail === 8) {
      const lo = (t[0] | (t[1] << 8) | (t[2] << 16) | (t[3] << 24)) >>> 0;
      const hi = (t[4] | (t[5] << 8) | (t[6] << 16) | (t[7] << 24)) >>> 0;
      compress(this.state, hi, lo);
      this.ntail = 0;
      t.fill(0);
    }
  }
}

/**
 * Hash strategy producing {@link SipHasher13} accumulators with a fixed key
 */
export class SipHash13Strategy implements HashStrategy {
  constructor(
    private readonly k0: bigint = 0n,
    private readonly k1: bigint = 0n
  ) {}

  buildHasher(): Hasher {
    return new SipHasher13(this.k0, this.k1);
  }
}

/**
 * SipHash-1-3 with an all-zero key
 */
export const defaultHashStrategy: HashStrategy = new SipHash13Strategy();
