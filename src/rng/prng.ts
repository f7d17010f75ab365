/**
 * Core PRNG implementation using Mulberry32
 *
 * Mulberry32 is a small, fast 32-bit PRNG with a period of 2^32. Every seeded
 * structure in the noise graph (permutation tables, layer seeds, turbulence
 * seeds) draws from it.
 *
 * Reference: https://gist.github.com/tommyettinger/46a874533244883189143505d203312c
 */

/**
 * Mulberry32 PRNG state
 */
export interface PrngState {
  /** Current 32-bit state */
  state: number;
}

/**
 * Create a new Mulberry32 PRNG with the given seed.
 *
 * @param seed - 32-bit unsigned integer seed
 */
export function createPrng(seed: number): PrngState {
  return {
    state: seed >>> 0,
  };
}

/**
 * Generate the next 32-bit unsigned integer from the PRNG.
 *
 * Mutates the state in place.
 *
 * @returns 32-bit unsigned integer (0 to 4294967295)
 */
export function nextUint32(prng: PrngState): number {
  let z = (prng.state = (prng.state + 0x6d2b79f5) >>> 0);
  z = Math.imul(z ^ (z >>> 15), z | 1);
  z ^= z + Math.imul(z ^ (z >>> 7), z | 61);

  return (z ^ (z >>> 14)) >>> 0;
}

/**
 * Generate a random float in [0, 1).
 */
export function nextFloat(prng: PrngState): number {
  return nextUint32(prng) / 0x100000000; // Divide by 2^32
}
