/**
 * SuperSimplex-style gradient noise, 2D and 3D.
 *
 * Uses a wider vertex kernel than {@link OpenSimplex} (r² = 2/3 in 2D, 3/4 in
 * 3D). The wider kernel overlaps neighbouring simplices, so every lattice
 * vertex within reach contributes, which smooths out the simplex grid.
 */

import { clamp, type Point2, type Point3 } from '../../math';
import { GRAD2_RING, GRAD3_UNIT } from '../gradients';
import type { NoiseFn, Seedable } from '../noiseFn';
import { SeededGenerator } from './seededGenerator';
import { neighbourhoodSimplexNoise, type SimplexKernel } from './simplex';

const KERNEL_2D: SimplexKernel = { radiusSquared: 2 / 3, gradients: GRAD2_RING, normalization: 18.24 };
const KERNEL_3D: SimplexKernel = { radiusSquared: 0.75, gradients: GRAD3_UNIT, normalization: 6.5 };

export type SuperSimplexPoint = Point2 | Point3;

export class SuperSimplex extends SeededGenerator implements NoiseFn<SuperSimplexPoint>, Seedable<SuperSimplex> {
  static readonly DEFAULT_SEED = 0;

  constructor(seed: number = SuperSimplex.DEFAULT_SEED) {
    super(seed);
  }

  withSeed(seed: number): SuperSimplex {
    return new SuperSimplex(seed);
  }

  get(point: SuperSimplexPoint): number {
    const kernel = point.length === 2 ? KERNEL_2D : KERNEL_3D;
    return clamp(neighbourhoodSimplexNoise(this.perm, point, kernel), -1, 1);
  }
}
