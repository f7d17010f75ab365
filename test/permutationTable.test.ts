import { PermutationTable, TABLE_SIZE } from '../src/noise';
import { createSeedStream } from '../src/rng';

describe('PermutationTable', () => {
  it('should be a permutation of 0..255', () => {
    const values = new PermutationTable(1234).values();

    expect(values).toHaveLength(TABLE_SIZE);
    expect([...values].sort((a, b) => a - b)).toEqual(Array.from({ length: TABLE_SIZE }, (_, i) => i));
  });

  it('should be identical for identical seeds', () => {
    expect(new PermutationTable(99).values()).toEqual(new PermutationTable(99).values());
  });

  it('should differ between seeds', () => {
    expect(new PermutationTable(1).values()).not.toEqual(new PermutationTable(2).values());
  });

  it('should match the golden prefix for seed 0', () => {
    expect(new PermutationTable(0).values().slice(0, 8)).toEqual([139, 69, 203, 62, 44, 36, 235, 95]);
  });

  it('should be the permutation stream shuffle of 0..255', () => {
    const identity = Array.from({ length: TABLE_SIZE }, (_, i) => i);
    expect(new PermutationTable(77).values()).toEqual(createSeedStream(77, 'permutation').shuffle(identity));
  });

  describe('hash', () => {
    const table = new PermutationTable(7);
    const perm = table.values();

    it('should look up a single coordinate directly', () => {
      expect(table.hash([5])).toBe(perm[5]);
    });

    it('should fold coordinates with XOR through the table', () => {
      expect(table.hash([3, 9])).toBe(perm[perm[3] ^ 9]);
      expect(table.hash([3, 9, 200])).toBe(perm[perm[perm[3] ^ 9] ^ 200]);
    });

    it('should wrap coordinates to a byte', () => {
      expect(table.hash([-1, 2])).toBe(table.hash([255, 2]));
      expect(table.hash([256, 2])).toBe(table.hash([0, 2]));
    });
  });
});
