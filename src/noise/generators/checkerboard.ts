import type { Point } from '../../math';
import type { NoiseFn } from '../noiseFn';

/**
 * Noise function that outputs a checkerboard pattern of 2^size blocks
 * alternating between -1.0 and 1.0.
 *
 * Each coordinate is truncated to an integer and masked by the block-size bit;
 * the masked bits are folded with XOR, and odd parity gives -1.0. Useful for
 * debugging pipelines.
 */
export class Checkerboard implements NoiseFn<Point> {
  static readonly DEFAULT_SIZE = 0;
  /** Largest size whose block bit still fits the 32-bit coordinate mask */
  static readonly MAX_SIZE = 30;

  private readonly blockBit: number;

  constructor(public readonly size: number = Checkerboard.DEFAULT_SIZE) {
    if (!Number.isInteger(size) || size < 0 || size > Checkerboard.MAX_SIZE) {
      throw new RangeError(`Checkerboard size must be an integer in 0..${Checkerboard.MAX_SIZE}, got ${size}`);
    }
    this.blockBit = 2 ** size;
  }

  withSize(size: number): Checkerboard {
    return new Checkerboard(size);
  }

  /** Block edge length in lattice units. */
  blockSize(): number {
    return this.blockBit;
  }

  get(point: Point): number {
    const coords: readonly number[] = point;
    const bit = this.blockBit;
    const parity = coords
      .map((c) => Math.trunc(c))
      .reduce((acc, c) => (acc & bit) ^ (c & bit), 0);

    return parity > 0 ? -1.0 : 1.0;
  }
}
