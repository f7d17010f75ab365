import type { Point } from '../../math';
import type { NoiseFn } from '../noiseFn';

/**
 * Noise function that outputs concentric cylinders centred on the origin and
 * extending forever along the z axis, like the rings of a tree.
 *
 * Only the (x, y) projection of the point is used. The value is 1.0 on every
 * integer radius and -1.0 halfway between two of them.
 */
export class Cylinders implements NoiseFn<Point> {
  static readonly DEFAULT_FREQUENCY = 1.0;

  constructor(public readonly frequency: number = Cylinders.DEFAULT_FREQUENCY) {}

  withFrequency(frequency: number): Cylinders {
    return new Cylinders(frequency);
  }

  get(point: Point): number {
    const x = point[0] * this.frequency;
    const y = point[1] * this.frequency;

    const distFromCenter = Math.sqrt(x * x + y * y);
    const distFromSmallerRing = distFromCenter - Math.floor(distFromCenter);
    const distFromLargerRing = 1.0 - distFromSmallerRing;
    const nearestDist = Math.min(distFromSmallerRing, distFromLargerRing);

    return 1.0 - nearestDist * 4.0;
  }
}
