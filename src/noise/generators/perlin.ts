/**
 * Perlin gradient noise, 2D to 4D.
 *
 * Every lattice corner carries a pseudo-random unit gradient. The value at a
 * point is the quintic-eased interpolation of the corner gradients dotted with
 * the corner-to-point offsets, so the output is exactly 0 at every integer
 * lattice point. Output lies in [-1, 1].
 */

import { clamp, dot, type Dimension, type Point } from '../../math';
import { GRAD2_UNIT, GRAD3_UNIT, GRAD4_UNIT, pickGradient } from '../gradients';
import type { NoiseFn, Seedable } from '../noiseFn';
import { interpolateCorners, visitCorners } from './lattice';
import { SeededGenerator } from './seededGenerator';

// 2 / sqrt(d): the reciprocal of the largest value unit gradients can reach
const SCALE_2D = Math.SQRT2;
const SCALE_3D = 2 / Math.sqrt(3);
const SCALE_4D = 1.0;

const GRADIENTS: Record<Dimension, ReadonlyArray<readonly number[]>> = {
  2: GRAD2_UNIT,
  3: GRAD3_UNIT,
  4: GRAD4_UNIT,
};

const SCALES: Record<Dimension, number> = { 2: SCALE_2D, 3: SCALE_3D, 4: SCALE_4D };

export class Perlin extends SeededGenerator implements NoiseFn<Point>, Seedable<Perlin> {
  static readonly DEFAULT_SEED = 0;

  constructor(seed: number = Perlin.DEFAULT_SEED) {
    super(seed);
  }

  withSeed(seed: number): Perlin {
    return new Perlin(seed);
  }

  get(point: Point): number {
    const gradients = GRADIENTS[point.length];
    const scale = SCALES[point.length];

    const { values, fraction } = visitCorners(this.perm, point, (corner) =>
      dot(pickGradient(gradients, corner.hash), corner.offset),
    );

    return clamp(interpolateCorners(values, fraction) * scale, -1, 1);
  }
}
