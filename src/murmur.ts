import { hash32 } from 'murmur-hash';
import type { HashStrategy, Hasher } from './hasher.js';

/**
 * Buffers written bytes and digests them with MurmurHash3 (32-bit).
 * The digest is widened to 64 bits with zero high bits.
 */
export class MurmurHasher implements Hasher {
  private readonly bytes: number[] = [];

  write(bytes: Uint8Array): void {
    for (const byte of bytes) {
      this.bytes.push(byte);
    }
  }

  writeU8(value: number): void {
    this.bytes.push(value & 0xff);
  }

  writeU32(value: number): void {
    this.bytes.push(value & 0xff, (value >>> 8) & 0xff, (value >>> 16) & 0xff, (value >>> 24) & 0xff);
  }

  writeU64(value: bigint): void {
    const word = BigInt.asUintN(64, value);
    this.writeU32(Number(word & 0xffffffffn));
    this.writeU32(Number(word >> 32n));
  }

  finish(): bigint {
    return BigInt(hash32(Uint8Array.from(this.bytes)) >>> 0);
  }
}

/**
 * Alternative strategy on MurmurHash3. Digests are 32 bits wide, so tables
 * should stay well below four billion slots.
 */
export class MurmurHashStrategy implements HashStrategy {
  buildHasher(): Hasher {
    return new MurmurHasher();
  }
}
