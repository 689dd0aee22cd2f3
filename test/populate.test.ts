import { describe, test, expect } from 'vitest';
import { populate, UNFILLED } from '../src/index.js';

describe('populate()', () => {
  test('returns an empty table without permutations', () => {
    expect(populate([], 7)).toHaveLength(0);
  });

  test('lets nodes claim their preferred free slot in index order', () => {
    const table = populate(
      [
        { offset: 0, skip: 1 },
        { offset: 0, skip: 3 },
      ],
      7
    );
    expect(Array.from(table)).toEqual([0, 0, 0, 1, 0, 1, 1]);
  });

  test('stops partway through a round once every slot is taken', () => {
    const table = populate(
      [
        { offset: 2, skip: 1 },
        { offset: 2, skip: 2 },
        { offset: 4, skip: 3 },
      ],
      5
    );
    // Node 2 only gets its first-round slot.
    expect(Array.from(table)).toEqual([2, 1, 0, 0, 1]);
  });

  test('treats identical permutations as competing nodes', () => {
    const same = { offset: 1, skip: 1 };
    expect(Array.from(populate([same, same, same], 5))).toEqual([1, 0, 1, 2, 0]);
  });

  test('leaves trailing nodes without slots when nodes outnumber slots', () => {
    const same = { offset: 0, skip: 1 };
    expect(Array.from(populate([same, same, same], 2))).toEqual([0, 1]);
  });

  test('fills every slot with a valid node index', () => {
    const permutations = [
      { offset: 10, skip: 7 },
      { offset: 10, skip: 7 },
      { offset: 3, skip: 96 },
      { offset: 50, skip: 1 },
    ];
    const table = populate(permutations, 97);

    expect(table).toHaveLength(97);
    expect(table.includes(UNFILLED)).toBe(false);
    const counts = [0, 0, 0, 0];
    for (const owner of table) counts[owner]++;
    expect(counts).toEqual([25, 24, 24, 24]);
  });

  test('rejects a zero skip', () => {
    expect(() => populate([{ offset: 0, skip: 0 }], 7)).toThrow('Permutation 0 has skip 0, expected 1..6');
  });

  test('rejects a skip of m or more', () => {
    expect(() => populate([{ offset: 0, skip: 1 }, { offset: 0, skip: 7 }], 7)).toThrow(
      'Permutation 1 has skip 7, expected 1..6'
    );
  });

  test('rejects offsets outside the table', () => {
    expect(() => populate([{ offset: 7, skip: 1 }], 7)).toThrow('Permutation 0 has offset 7, expected 0..6');
    expect(() => populate([{ offset: -1, skip: 1 }], 7)).toThrow(RangeError);
    expect(() => populate([{ offset: 0.5, skip: 1 }], 7)).toThrow(RangeError);
  });

  test('rejects a skip sharing a factor with a non-prime table size', () => {
    expect(() => populate([{ offset: 0, skip: 2 }], 8)).toThrow(
      'Permutation 0 has skip 2, which does not visit every slot of 8'
    );
  });

  test('accepts a non-prime table size when every skip is coprime to it', () => {
    expect(Array.from(populate([{ offset: 0, skip: 3 }, { offset: 1, skip: 1 }], 4))).toEqual([0, 1, 1, 0]);
  });
});
