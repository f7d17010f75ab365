/**
 * Hyper-cube lattice walk shared by Perlin, Perlin-surflet and value noise.
 *
 * A point in d dimensions lies in a unit cell with 2^d integer corners. Each
 * corner is identified by a bit mask (bit i set = corner sits at the upper
 * edge along axis i); the callers decide what value a corner contributes and
 * whether the corner values are interpolated or summed.
 */

import { sCurve5, lerp } from '../../math';
import type { PermutationTable } from '../permutationTable';

export interface LatticeCorner {
  /** Integer lattice coordinates of the corner */
  lattice: number[];
  /** Offset from the corner to the sample point */
  offset: number[];
  /** Permutation hash of the corner */
  hash: number;
}

/**
 * Visit every corner of the cell containing `coords` and collect the value
 * `cornerValue` returns for it, indexed by corner mask.
 */
export function visitCorners(
  perm: PermutationTable,
  coords: readonly number[],
  cornerValue: (corner: LatticeCorner) => number,
): { values: number[]; fraction: number[] } {
  const dims = coords.length;
  const cell = coords.map(Math.floor);
  const fraction = coords.map((c, i) => c - cell[i]);
  const values: number[] = [];

  for (let mask = 0; mask < 1 << dims; mask++) {
    const lattice: number[] = [];
    const offset: number[] = [];
    for (let axis = 0; axis < dims; axis++) {
      const bit = (mask >> axis) & 1;
      lattice.push(cell[axis] + bit);
      offset.push(fraction[axis] - bit);
    }
    values.push(cornerValue({ lattice, offset, hash: perm.hash(lattice) }));
  }

  return { values, fraction };
}

/**
 * Fold corner values into one by interpolating along axis 0, then axis 1, and
 * so on, with quintic-eased weights.
 */
export function interpolateCorners(values: readonly number[], fraction: readonly number[]): number {
  let layer = [...values];

  for (let axis = 0; axis < fraction.length; axis++) {
    const weight = sCurve5(fraction[axis]);
    const next: number[] = [];
    for (let i = 0; i < layer.length; i += 2) {
      next.push(lerp(layer[i], layer[i + 1], weight));
    }
    layer = next;
  }

  return layer[0];
}
