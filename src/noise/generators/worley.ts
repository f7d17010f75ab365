/**
 * Worley (cellular) noise, 2D to 4D.
 *
 * Space is cut into unit cells, each holding one feature point at a
 * pseudo-random position with a pseudo-random value. A sample reports the
 * distance to its nearest feature point, that point's value, or a quantity
 * comparing the nearest and second-nearest points.
 */

import type { Point } from '../../math';
import type { NoiseFn, Seedable } from '../noiseFn';
import type { PermutationTable } from '../permutationTable';
import { SeededGenerator } from './seededGenerator';

export type WorleyReturnType = 'distance' | 'value' | 'secondDistance' | 'distanceDifference';

export type DistanceFunctionName = 'euclidean' | 'euclideanSquared' | 'manhattan' | 'chebyshev';

interface DistanceFunction {
  measure(delta: readonly number[]): number;
  /**
   * Smallest distance a point can have from the sample when the two differ by
   * at least `gap` along one axis.
   */
  lowerBound(gap: number): number;
}

export const DISTANCE_FUNCTIONS: Record<DistanceFunctionName, DistanceFunction> = {
  euclidean: {
    measure: (delta) => Math.sqrt(delta.reduce((sum, d) => sum + d * d, 0)),
    lowerBound: (gap) => gap,
  },
  euclideanSquared: {
    measure: (delta) => delta.reduce((sum, d) => sum + d * d, 0),
    lowerBound: (gap) => gap * gap,
  },
  manhattan: {
    measure: (delta) => delta.reduce((sum, d) => sum + Math.abs(d), 0),
    lowerBound: (gap) => gap,
  },
  chebyshev: {
    measure: (delta) => delta.reduce((max, d) => Math.max(max, Math.abs(d)), 0),
    lowerBound: (gap) => gap,
  },
};

interface FeatureMatch {
  distance: number;
  value: number;
}

// Ring radius past which the search stops; a 4D manhattan second-nearest
// search settles by radius 5
const MAX_SEARCH_RADIUS = 8;

// Hash salts appended to the cell coordinates; axis salts are 0..3
const VALUE_SALT = 8;
const FINE_SALT = 16;

function unitHash(perm: PermutationTable, cell: readonly number[], salt: number): number {
  const coarse = perm.hash([...cell, salt]);
  const fine = perm.hash([...cell, salt + FINE_SALT]);
  return (coarse * 256 + fine) / 65536;
}

/**
 * Feature point inside `cell`, in absolute coordinates, and its value.
 */
export function featurePoint(perm: PermutationTable, cell: readonly number[]): { position: number[]; value: number } {
  const position = cell.map((c, axis) => c + unitHash(perm, cell, axis));
  const value = (perm.hash([...cell, VALUE_SALT]) / 255) * 2 - 1;
  return { position, value };
}

/** Offsets whose Chebyshev norm is exactly `radius`. */
function ringOffsets(dims: number, radius: number): number[][] {
  const side = 2 * radius + 1;
  const total = side ** dims;
  const offsets: number[][] = [];

  for (let index = 0; index < total; index++) {
    const offset: number[] = [];
    let rest = index;
    let onRing = false;
    for (let axis = 0; axis < dims; axis++) {
      const o = (rest % side) - radius;
      rest = Math.floor(rest / side);
      if (Math.abs(o) === radius) onRing = true;
      offset.push(o);
    }
    if (onRing) offsets.push(offset);
  }

  return offsets;
}

export class Worley extends SeededGenerator implements NoiseFn<Point>, Seedable<Worley> {
  static readonly DEFAULT_SEED = 0;
  static readonly DEFAULT_FREQUENCY = 1.0;

  constructor(
    seed: number = Worley.DEFAULT_SEED,
    public readonly frequency: number = Worley.DEFAULT_FREQUENCY,
    public readonly returnType: WorleyReturnType = 'value',
    public readonly distanceFunction: DistanceFunctionName = 'euclidean',
  ) {
    super(seed);
  }

  withSeed(seed: number): Worley {
    return new Worley(seed, this.frequency, this.returnType, this.distanceFunction);
  }

  withFrequency(frequency: number): Worley {
    return new Worley(this.seed, frequency, this.returnType, this.distanceFunction);
  }

  withReturnType(returnType: WorleyReturnType): Worley {
    return new Worley(this.seed, this.frequency, returnType, this.distanceFunction);
  }

  withDistanceFunction(distanceFunction: DistanceFunctionName): Worley {
    return new Worley(this.seed, this.frequency, this.returnType, distanceFunction);
  }

  get(point: Point): number {
    const coords: readonly number[] = point;
    const scaled = coords.map((c) => c * this.frequency);
    if (!scaled.every((c) => Number.isFinite(c))) {
      return NaN;
    }

    const { nearest, second } = this.search(scaled);

    switch (this.returnType) {
      case 'distance':
        return nearest.distance;
      case 'value':
        return nearest.value;
      case 'secondDistance':
        return second.distance;
      case 'distanceDifference':
        return second.distance - nearest.distance;
    }
  }

  /**
   * Expand Chebyshev rings around the containing cell until no unvisited cell
   * can hold a feature point closer than the ones already found. Expects
   * finite coordinates.
   */
  private search(coords: readonly number[]): { nearest: FeatureMatch; second: FeatureMatch } {
    const metric = DISTANCE_FUNCTIONS[this.distanceFunction];
    const needsSecond = this.returnType === 'secondDistance' || this.returnType === 'distanceDifference';
    const cell = coords.map(Math.floor);

    let nearest: FeatureMatch = { distance: Infinity, value: 0 };
    let second: FeatureMatch = { distance: Infinity, value: 0 };

    for (let radius = 0; radius <= MAX_SEARCH_RADIUS; radius++) {
      for (const offset of ringOffsets(coords.length, radius)) {
        const neighbour = cell.map((c, axis) => c + offset[axis]);
        const feature = featurePoint(this.perm, neighbour);
        const distance = metric.measure(coords.map((c, axis) => feature.position[axis] - c));

        if (distance < nearest.distance) {
          second = nearest;
          nearest = { distance, value: feature.value };
        } else if (distance < second.distance) {
          second = { distance, value: feature.value };
        }
      }

      // Every cell in ring radius + 1 is at least `radius` away along one axis
      const bound = metric.lowerBound(radius);
      const target = needsSecond ? second.distance : nearest.distance;
      if (bound >= target) {
        return { nearest, second };
      }
    }

    return { nearest, second };
  }
}
