/**
 * Seeded permutation table.
 *
 * A shuffled copy of 0..255 built once per generator. Lattice generators hash
 * integer cell coordinates through it to pick gradients and pseudo-random
 * values, so the same seed always yields the same noise.
 */

import { createSeedStream } from '../rng';

export const TABLE_SIZE = 256;

function buildPermTable(seed: number): Uint8Array {
  const identity = Array.from({ length: TABLE_SIZE }, (_, i) => i);
  return Uint8Array.from(createSeedStream(seed, 'permutation').shuffle(identity));
}

export class PermutationTable {
  private readonly perm: Uint8Array;

  constructor(public readonly seed: number) {
    this.perm = buildPermTable(seed);
  }

  /**
   * Reduce integer lattice coordinates to one byte: each coordinate is masked
   * to a byte and XORed into the running table lookup.
   */
  hash(coords: readonly number[]): number {
    const perm = this.perm;
    let index = coords[0] & 0xff;

    for (let i = 1; i < coords.length; i++) {
      index = perm[index] ^ (coords[i] & 0xff);
    }

    return perm[index];
  }

  /** Copy of the shuffled table. */
  values(): number[] {
    return Array.from(this.perm);
  }
}
