import type { Point } from '../../math';
import type { NoiseFn } from '../noiseFn';

/**
 * Noise function that clamps the output of its source to `[lower, upper]`.
 *
 * The value is raised to `lower` first and then lowered to `upper`, so bounds
 * given in the wrong order are kept as given: every output becomes `upper`.
 */
export class Clamp<P extends Point = Point> implements NoiseFn<P> {
  static readonly DEFAULT_BOUNDS: readonly [number, number] = [-1.0, 1.0];

  constructor(
    public readonly source: NoiseFn<P>,
    public readonly bounds: readonly [number, number] = Clamp.DEFAULT_BOUNDS,
  ) {}

  withBounds(lower: number, upper: number): Clamp<P> {
    return new Clamp(this.source, [lower, upper]);
  }

  withLowerBound(lower: number): Clamp<P> {
    return new Clamp(this.source, [lower, this.bounds[1]]);
  }

  withUpperBound(upper: number): Clamp<P> {
    return new Clamp(this.source, [this.bounds[0], upper]);
  }

  get(point: P): number {
    const [lower, upper] = this.bounds;
    return Math.min(Math.max(this.source.get(point), lower), upper);
  }
}
