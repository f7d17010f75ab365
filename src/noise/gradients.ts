/**
 * Gradient vector tables for the lattice and simplex generators.
 */

type Vec = readonly number[];

const SQRT_HALF = Math.SQRT1_2;

// 8 unit vectors: the axes and the diagonals
export const GRAD2_UNIT: ReadonlyArray<Vec> = [
  [1, 0], [-1, 0], [0, 1], [0, -1],
  [SQRT_HALF, SQRT_HALF], [-SQRT_HALF, SQRT_HALF],
  [SQRT_HALF, -SQRT_HALF], [-SQRT_HALF, -SQRT_HALF],
];

// 12 cube-edge midpoints, padded to 16 with a repeated tetrahedron so a
// 4-bit mask can index the table
export const GRAD3: ReadonlyArray<Vec> = [
  [1, 1, 0], [-1, 1, 0], [1, -1, 0], [-1, -1, 0],
  [1, 0, 1], [-1, 0, 1], [1, 0, -1], [-1, 0, -1],
  [0, 1, 1], [0, -1, 1], [0, 1, -1], [0, -1, -1],
  [1, 1, 0], [-1, 1, 0], [0, -1, 1], [0, -1, -1],
];

// 32 gradients in 4D (from the corners of a 4D hypercube, selecting
// those with 3 non-zero components for better isotropy)
export const GRAD4: ReadonlyArray<Vec> = [
  [0, 1, 1, 1], [0, 1, 1, -1], [0, 1, -1, 1], [0, 1, -1, -1],
  [0, -1, 1, 1], [0, -1, 1, -1], [0, -1, -1, 1], [0, -1, -1, -1],
  [1, 0, 1, 1], [1, 0, 1, -1], [1, 0, -1, 1], [1, 0, -1, -1],
  [-1, 0, 1, 1], [-1, 0, 1, -1], [-1, 0, -1, 1], [-1, 0, -1, -1],
  [1, 1, 0, 1], [1, 1, 0, -1], [1, -1, 0, 1], [1, -1, 0, -1],
  [-1, 1, 0, 1], [-1, 1, 0, -1], [-1, -1, 0, 1], [-1, -1, 0, -1],
  [1, 1, 1, 0], [1, 1, -1, 0], [1, -1, 1, 0], [1, -1, -1, 0],
  [-1, 1, 1, 0], [-1, 1, -1, 0], [-1, -1, 1, 0], [-1, -1, -1, 0],
];

function normalized(table: ReadonlyArray<Vec>): ReadonlyArray<Vec> {
  return table.map((v) => {
    const length = Math.sqrt(v.reduce((sum, c) => sum + c * c, 0));
    return v.map((c) => c / length);
  });
}

export const GRAD3_UNIT = normalized(GRAD3);
export const GRAD4_UNIT = normalized(GRAD4);

// 2D projection of the first twelve 3D edge vectors, as classic 2D simplex
// noise uses
export const GRAD3_XY: ReadonlyArray<Vec> = GRAD3.slice(0, 12).map((v) => [v[0], v[1]]);

// 24 evenly spaced unit directions
export const GRAD2_RING: ReadonlyArray<Vec> = Array.from({ length: 24 }, (_, k) => {
  const angle = (k * Math.PI) / 12;
  return [Math.cos(angle), Math.sin(angle)];
});

/** Pick the table entry for a hash byte. */
export function pickGradient(table: ReadonlyArray<Vec>, hash: number): Vec {
  return table[hash % table.length];
}
