/**
 * Value noise: every lattice corner carries a pseudo-random scalar in
 * [-1, 1] and the point's value is their quintic-eased interpolation.
 */

import type { Point } from '../../math';
import type { NoiseFn, Seedable } from '../noiseFn';
import { interpolateCorners, visitCorners } from './lattice';
import { SeededGenerator } from './seededGenerator';

export class Value extends SeededGenerator implements NoiseFn<Point>, Seedable<Value> {
  static readonly DEFAULT_SEED = 0;

  constructor(seed: number = Value.DEFAULT_SEED) {
    super(seed);
  }

  withSeed(seed: number): Value {
    return new Value(seed);
  }

  get(point: Point): number {
    const { values, fraction } = visitCorners(this.perm, point, (corner) => (corner.hash / 255) * 2 - 1);
    return interpolateCorners(values, fraction);
  }
}
