/**
 * Evaluation contract shared by every node in a noise graph.
 *
 * A noise function takes an n-dimensional point (n = 2, 3 or 4) and returns a
 * scalar. Generators compute that value from coherent-noise algorithms;
 * modifiers, combiners, selectors and transformers derive it from the values
 * of their child nodes. Nodes are immutable once constructed, so one node can
 * be handed to any number of parents.
 */

import type { Point } from '../math';

export interface NoiseFn<P extends Point = Point> {
  // Property syntax keeps `P` contravariant: a 2D/3D-only node is not a NoiseFn<Point>
  readonly get: (point: P) => number;
}

/**
 * Nodes whose output depends on a seed.
 *
 * `withSeed` never mutates: it returns a new node configured with the seed.
 */
export interface Seedable<Self> {
  withSeed(seed: number): Self;
  getSeed(): number;
}
