import type { Point } from '../../math';
import type { NoiseFn } from '../noiseFn';

/**
 * Noise function that outputs a constant value for every point.
 *
 * Not useful by itself, but a handy source for combiners and selectors.
 */
export class Constant implements NoiseFn<Point> {
  constructor(public readonly value: number) {}

  get(_point: Point): number {
    return this.value;
  }
}
