import { describe, test, expect } from 'vitest';
import { hashInto, hashWithSeed, type Hash, type Hasher, type HashStrategy } from '../src/index.js';

type Write = ['bytes', number[]] | ['u8', number] | ['u32', number] | ['u64', bigint];

class RecordingHasher implements Hasher {
  readonly writes: Write[] = [];

  write(bytes: Uint8Array): void {
    this.writes.push(['bytes', Array.from(bytes)]);
  }
  writeU8(value: number): void {
    this.writes.push(['u8', value]);
  }
  writeU32(value: number): void {
    this.writes.push(['u32', value]);
  }
  writeU64(value: bigint): void {
    this.writes.push(['u64', value]);
  }
  finish(): bigint {
    return BigInt(this.writes.length);
  }
}

function record(value: Parameters<typeof hashInto>[0]): Write[] {
  const hasher = new RecordingHasher();
  hashInto(value, hasher);
  return hasher.writes;
}

describe('hashInto()', () => {
  test('writes strings as UTF-8 followed by 0xff', () => {
    expect(record('hé')).toEqual([
      ['bytes', [0x68, 0xc3, 0xa9]],
      ['u8', 0xff],
    ]);
  });

  test('writes safe integers as 64-bit two\'s complement', () => {
    expect(record(42)).toEqual([['u64', 42n]]);
    expect(record(-1)).toEqual([['u64', 0xffffffffffffffffn]]);
  });

  test('writes other numbers as IEEE-754 bits', () => {
    expect(record(1.5)).toEqual([['u64', 0x3ff8000000000000n]]);
  });

  test('writes bigints and rejects ones wider than 64 bits', () => {
    expect(record(7n)).toEqual([['u64', 7n]]);
    expect(record(-2n)).toEqual([['u64', 0xfffffffffffffffen]]);
    expect(() => record(1n << 64n)).toThrow('BigInt value does not fit in 64 bits');
    expect(() => record(-(1n << 63n) - 1n)).toThrow(RangeError);
  });

  test('writes booleans as one byte', () => {
    expect(record(true)).toEqual([['u8', 1]]);
    expect(record(false)).toEqual([['u8', 0]]);
  });

  test('prefixes byte arrays with their length', () => {
    expect(record(new Uint8Array([9, 8]))).toEqual([
      ['u64', 2n],
      ['bytes', [9, 8]],
    ]);
  });

  test('prefixes arrays with their length and hashes each element', () => {
    expect(record(['ab', 3])).toEqual([
      ['u64', 2n],
      ['bytes', [0x61, 0x62]],
      ['u8', 0xff],
      ['u64', 3n],
    ]);
  });

  test('delegates to objects implementing Hash', () => {
    const endpoint: Hash = {
      hash(hasher) {
        hasher.writeU32(10);
        hasher.writeU8(1);
      },
    };
    expect(record([endpoint])).toEqual([
      ['u64', 1n],
      ['u32', 10],
      ['u8', 1],
    ]);
  });
});

describe('hashWithSeed()', () => {
  test('writes the seed before the value', () => {
    const built: RecordingHasher[] = [];
    const strategy: HashStrategy = {
      buildHasher() {
        const hasher = new RecordingHasher();
        built.push(hasher);
        return hasher;
      },
    };

    expect(hashWithSeed(strategy, 'a', 0xdeadbabe)).toBe(3n);
    expect(built).toHaveLength(1);
    expect(built[0].writes).toEqual([
      ['u32', 0xdeadbabe],
      ['bytes', [0x61]],
      ['u8', 0xff],
    ]);
  });
});
