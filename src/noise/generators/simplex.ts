/**
 * Simplex-lattice evaluation shared by OpenSimplex and SuperSimplex.
 *
 * Input space is skewed so the simplex lattice becomes the integer lattice,
 * the surrounding vertices are found in skewed space, and each vertex adds
 * `(r² - |offset|²)⁴ · (gradient · offset)` measured back in input space.
 */

import { dot, magnitudeSquared } from '../../math';
import { pickGradient } from '../gradients';
import type { PermutationTable } from '../permutationTable';

export interface SimplexKernel {
  /** Squared radius of the vertex falloff */
  radiusSquared: number;
  /** Gradient table indexed by vertex hash */
  gradients: ReadonlyArray<readonly number[]>;
  /** Multiplier bringing the summed contributions to roughly [-1, 1] */
  normalization: number;
}

export function skewFactor(dims: number): number {
  return (Math.sqrt(dims + 1) - 1) / dims;
}

export function unskewFactor(dims: number): number {
  return (1 - 1 / Math.sqrt(dims + 1)) / dims;
}

function contribution(
  perm: PermutationTable,
  kernel: SimplexKernel,
  vertex: readonly number[],
  offset: readonly number[],
): number {
  let t = kernel.radiusSquared - magnitudeSquared(offset);
  if (t <= 0) {
    return 0;
  }
  t *= t;
  return t * t * dot(pickGradient(kernel.gradients, perm.hash(vertex)), offset);
}

/**
 * Sum the d + 1 vertices of the simplex containing the point.
 *
 * The simplex is found by ranking the offsets from the cell origin: vertex k
 * steps along every axis whose rank is at least d - k.
 */
export function containingSimplexNoise(
  perm: PermutationTable,
  coords: readonly number[],
  kernel: SimplexKernel,
): number {
  const dims = coords.length;
  const F = skewFactor(dims);
  const G = unskewFactor(dims);

  // Skew the input space to determine which simplex cell we're in
  const s = coords.reduce((sum, c) => sum + c, 0) * F;
  const cell = coords.map((c) => Math.floor(c + s));

  // Unskew the cell origin back to input space
  const t = cell.reduce((sum, c) => sum + c, 0) * G;
  const origin = coords.map((c, i) => c - (cell[i] - t));

  // Rank each axis by its offset; the largest offset gets rank d - 1
  const rank = new Array<number>(dims).fill(0);
  for (let i = 0; i < dims; i++) {
    for (let j = i + 1; j < dims; j++) {
      if (origin[i] > origin[j]) rank[i]++;
      else rank[j]++;
    }
  }

  let total = 0;
  for (let k = 0; k <= dims; k++) {
    const vertex: number[] = [];
    const offset: number[] = [];
    for (let axis = 0; axis < dims; axis++) {
      const step = rank[axis] >= dims - k ? 1 : 0;
      vertex.push(cell[axis] + step);
      offset.push(origin[axis] - step + k * G);
    }
    total += contribution(perm, kernel, vertex, offset);
  }

  return total * kernel.normalization;
}

/**
 * Sum every simplex-lattice vertex whose kernel reaches the point.
 *
 * Skewing stretches distances by at most sqrt(d + 1), so for kernels with
 * r · sqrt(d + 1) < 2 all reachable vertices sit within one cell below and
 * two cells above the point's skewed cell on every axis.
 */
export function neighbourhoodSimplexNoise(
  perm: PermutationTable,
  coords: readonly number[],
  kernel: SimplexKernel,
): number {
  const dims = coords.length;
  const F = skewFactor(dims);
  const G = unskewFactor(dims);

  const s = coords.reduce((sum, c) => sum + c, 0) * F;
  const base = coords.map((c) => Math.floor(c + s));

  let total = 0;
  const span = 4;
  const count = span ** dims;
  for (let index = 0; index < count; index++) {
    const vertex: number[] = [];
    let rest = index;
    for (let axis = 0; axis < dims; axis++) {
      vertex.push(base[axis] - 1 + (rest % span));
      rest = Math.floor(rest / span);
    }

    const t = vertex.reduce((sum, v) => sum + v, 0) * G;
    const offset = coords.map((c, i) => c - (vertex[i] - t));
    total += contribution(perm, kernel, vertex, offset);
  }

  return total * kernel.normalization;
}
