/**
 * RNG Stream implementation
 *
 * A stream wraps one Mulberry32 state and offers the draws the noise graph
 * needs: raw uint32 seeds, floats, bounded integers, shuffles and label-based
 * forks.
 */

import { createPrng, nextUint32, nextFloat, type PrngState } from './prng';
import { hashString, combineSeed } from './hash';

/**
 * RNG Stream - provides random number generation methods
 *
 * @example
 * ```ts
 * const stream = new RngStream(12345, "turbulence");
 *
 * const seed = stream.nextUint32();       // seed for a sub-generator
 * const n = stream.int(0, 256);           // 0..255
 * const table = stream.shuffle([0, 1, 2]); // new shuffled array
 *
 * // Fork for an independent sub-stream
 * const layers = stream.fork("layers");
 * ```
 */
export class RngStream {
  private readonly prng: PrngState;
  private readonly originalSeed: number;

  /**
   * @param seed - 32-bit seed for this stream
   * @param label - Optional label for debugging
   */
  constructor(seed: number, public readonly label?: string) {
    this.originalSeed = seed >>> 0;
    this.prng = createPrng(this.originalSeed);
  }

  /**
   * Generate the next 32-bit unsigned integer.
   *
   * @returns 32-bit unsigned integer (0 to 4294967295)
   */
  nextUint32(): number {
    return nextUint32(this.prng);
  }

  /**
   * Generate a random float in [0, 1).
   */
  float(): number {
    return nextFloat(this.prng);
  }

  /**
   * Generate a random integer in [min, max).
   *
   * @throws {Error} If min >= max or if either bound is not an integer
   *
   * @example
   * ```ts
   * stream.int(0, 10);  // 0, 1, 2, ..., 9
   * ```
   */
  int(min: number, max: number): number {
    if (!Number.isInteger(min) || !Number.isInteger(max)) {
      throw new Error(`int(min, max) requires integer arguments, got min=${min}, max=${max}`);
    }

    if (min >= max) {
      throw new Error(`int(min, max) requires min < max, got min=${min}, max=${max}`);
    }

    const range = max - min;
    return min + Math.floor(this.float() * range);
  }

  /**
   * Shuffle an array (returns a new array, does not mutate input).
   *
   * Uses Fisher-Yates shuffle algorithm.
   */
  shuffle<T>(arr: readonly T[]): T[] {
    const result = [...arr];

    for (let i = result.length - 1; i > 0; i--) {
      const j = this.int(0, i + 1);
      [result[i], result[j]] = [result[j], result[i]];
    }

    return result;
  }

  /**
   * Fork this stream to create an independent sub-stream.
   *
   * The fork is derived from the original seed + label, NOT from the current
   * position, so forks are stable even if the parent's call count changes.
   */
  fork(label: string | number): RngStream {
    const labelSeed = typeof label === 'string'
      ? hashString(label)
      : (label >>> 0);

    const forkedSeed = combineSeed(this.originalSeed, labelSeed);
    const forkedLabel = this.label
      ? `${this.label}/${label}`
      : String(label);

    return new RngStream(forkedSeed, forkedLabel);
  }

  /**
   * Seed this stream was created with.
   */
  getSeed(): number {
    return this.originalSeed;
  }
}
