/**
 * Perlin noise built from surflets.
 *
 * Walks the same lattice cell as {@link Perlin}, but instead of interpolating
 * the corner values each corner adds a radially attenuated gradient ramp
 * `(1 - |offset|²)⁴ · (gradient · offset)`. The attenuation reaches zero one
 * unit from the corner, which keeps the result continuous across cells.
 */

import { clamp, dot, magnitudeSquared, type Dimension, type Point } from '../../math';
import { GRAD2_UNIT, GRAD3_UNIT, GRAD4_UNIT, pickGradient } from '../gradients';
import type { NoiseFn, Seedable } from '../noiseFn';
import { visitCorners } from './lattice';
import { SeededGenerator } from './seededGenerator';

const SCALE_2D = 3.1604938271604937;
const SCALE_3D = 3.8898553255531074;
const SCALE_4D = 4.424369240215691;

const GRADIENTS: Record<Dimension, ReadonlyArray<readonly number[]>> = {
  2: GRAD2_UNIT,
  3: GRAD3_UNIT,
  4: GRAD4_UNIT,
};

const SCALES: Record<Dimension, number> = { 2: SCALE_2D, 3: SCALE_3D, 4: SCALE_4D };

export class PerlinSurflet extends SeededGenerator implements NoiseFn<Point>, Seedable<PerlinSurflet> {
  static readonly DEFAULT_SEED = 0;

  constructor(seed: number = PerlinSurflet.DEFAULT_SEED) {
    super(seed);
  }

  withSeed(seed: number): PerlinSurflet {
    return new PerlinSurflet(seed);
  }

  get(point: Point): number {
    const gradients = GRADIENTS[point.length];
    const scale = SCALES[point.length];

    const { values } = visitCorners(this.perm, point, (corner) => {
      const attenuation = 1 - magnitudeSquared(corner.offset);
      if (attenuation <= 0) {
        return 0;
      }
      const a2 = attenuation * attenuation;
      return a2 * a2 * dot(pickGradient(gradients, corner.hash), corner.offset);
    });

    const sum = values.reduce((acc, v) => acc + v, 0);
    return clamp(sum * scale, -1, 1);
  }
}
