/**
 * Coherent noise
 *
 * Generators, combinators and the fractal engine. Every node is an immutable
 * value: `with*` calls return a new node and `get(point)` is a pure function
 * of the node and the point.
 *
 * @example
 * ```ts
 * const terrain = new ScaleBias(
 *   Fractal.create(new Perlin(), 8).withSeed(42).withBlender(new RidgedBlender()),
 * ).withScale(0.5);
 * terrain.get([1.5, 2.25]);
 * ```
 */

export type { Point, Point2, Point3, Point4, Dimension } from '../math';
export { DIMENSIONS, mapPoint } from '../math';
export { deriveSeeds } from '../rng';

export type { NoiseFn, Seedable } from './noiseFn';
export { EmptyLayerStackError, UnsupportedDimensionError } from './errors';
export { PermutationTable, TABLE_SIZE } from './permutationTable';
export {
  Combiner,
  BINARY_OPERATIONS,
  type BinaryOperationName,
  add,
  multiply,
  power,
  min,
  max,
} from './combiner';

export * from './generators';
export * from './modifiers';
export * from './selectors';
export * from './transformers';
export * from './fractals';
