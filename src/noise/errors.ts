import type { Dimension } from '../math';

/**
 * Thrown when a fractal or turbulence node is built or resized to zero layers.
 * A layer stack always holds at least one generator.
 */
export class EmptyLayerStackError extends Error {
  constructor(owner: string) {
    super(`${owner} requires at least one layer`);
    this.name = 'EmptyLayerStackError';
  }
}

/**
 * Thrown when a node is asked to evaluate points of an arity its algorithm
 * does not implement.
 */
export class UnsupportedDimensionError extends Error {
  constructor(
    public readonly node: string,
    public readonly dimension: Dimension,
  ) {
    super(`${node} does not support ${dimension}D points`);
    this.name = 'UnsupportedDimensionError';
  }
}
