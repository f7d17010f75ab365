/**
 * OpenSimplex-style gradient noise on the simplex lattice, 2D to 4D.
 *
 * Each sample sums the d + 1 vertices of its containing simplex, so the
 * vertex count grows linearly with dimension instead of as 2^d.
 */

import { clamp, type Dimension, type Point } from '../../math';
import { GRAD3, GRAD3_XY, GRAD4 } from '../gradients';
import type { NoiseFn, Seedable } from '../noiseFn';
import { SeededGenerator } from './seededGenerator';
import { containingSimplexNoise, type SimplexKernel } from './simplex';

const KERNELS: Record<Dimension, SimplexKernel> = {
  2: { radiusSquared: 0.5, gradients: GRAD3_XY, normalization: 70.0 },
  3: { radiusSquared: 0.6, gradients: GRAD3, normalization: 32.0 },
  4: { radiusSquared: 0.6, gradients: GRAD4, normalization: 27.0 },
};

export class OpenSimplex extends SeededGenerator implements NoiseFn<Point>, Seedable<OpenSimplex> {
  static readonly DEFAULT_SEED = 0;

  constructor(seed: number = OpenSimplex.DEFAULT_SEED) {
    super(seed);
  }

  withSeed(seed: number): OpenSimplex {
    return new OpenSimplex(seed);
  }

  get(point: Point): number {
    return clamp(containingSimplexNoise(this.perm, point, KERNELS[point.length]), -1, 1);
  }
}
