import type { Point } from '../../math';
import type { NoiseFn } from '../noiseFn';

/** Noise function that outputs the absolute value of its source. */
export class Abs<P extends Point = Point> implements NoiseFn<P> {
  constructor(public readonly source: NoiseFn<P>) {}

  get(point: P): number {
    return Math.abs(this.source.get(point));
  }
}
