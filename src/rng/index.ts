/**
 * Deterministic RNG System
 *
 * Seeded random number generation for the noise graph:
 * - Mulberry32 streams created from a 32-bit seed
 * - Label-based forking for independent sub-streams
 * - Seed sequences: the k-th derived seed depends only on (owner seed, k)
 *
 * @example
 * ```ts
 * const seeds = deriveSeeds(42, 4);        // four decorrelated seeds
 * const more = deriveSeeds(42, 6);         // more[0..3] === seeds[0..3]
 * const stream = createSeedStream(42);
 * const table = stream.shuffle([0, 1, 2, 3]);
 * ```
 */

import { RngStream } from './streams';

/**
 * Create a fresh stream for deriving sub-seeds from an owner seed. Streams
 * with different labels are independent forks of the same seed.
 */
export function createSeedStream(seed: number, label?: string): RngStream {
  const root = new RngStream(seed >>> 0);
  return label === undefined ? root : root.fork(label);
}

/**
 * Draw the first `count` seeds of the sequence rooted at `seed`.
 *
 * The sequence is rebuilt from scratch on every call, so a prefix never
 * changes when `count` grows or shrinks.
 */
export function deriveSeeds(seed: number, count: number): number[] {
  const stream = createSeedStream(seed, 'seed-sequence');
  const seeds: number[] = [];

  for (let i = 0; i < count; i++) {
    seeds.push(stream.nextUint32());
  }

  return seeds;
}

export { RngStream };
export { normalizeSeed, hashString, combineSeed } from './hash';
export { createPrng, nextUint32, nextFloat, type PrngState } from './prng';
