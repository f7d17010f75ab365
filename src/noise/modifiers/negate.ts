import type { Point } from '../../math';
import type { NoiseFn } from '../noiseFn';

/** Noise function that negates the output of its source. */
export class Negate<P extends Point = Point> implements NoiseFn<P> {
  constructor(public readonly source: NoiseFn<P>) {}

  get(point: P): number {
    return -this.source.get(point);
  }
}
