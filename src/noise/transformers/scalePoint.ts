import { mapPoint, type Point } from '../../math';
import type { NoiseFn } from '../noiseFn';

type AxisValues = readonly [number, number, number, number];

/**
 * Noise function that scales each coordinate of the point by its own factor
 * before evaluating the source. Axes are x, y, z and u; a point only uses as
 * many factors as it has coordinates.
 */
export class ScalePoint<P extends Point = Point> implements NoiseFn<P> {
  static readonly DEFAULT_SCALES: AxisValues = [1.0, 1.0, 1.0, 1.0];

  constructor(
    public readonly source: NoiseFn<P>,
    public readonly scales: AxisValues = ScalePoint.DEFAULT_SCALES,
  ) {}

  withXScale(x: number): ScalePoint<P> {
    return this.withAllScales(x, this.scales[1], this.scales[2], this.scales[3]);
  }

  withYScale(y: number): ScalePoint<P> {
    return this.withAllScales(this.scales[0], y, this.scales[2], this.scales[3]);
  }

  withZScale(z: number): ScalePoint<P> {
    return this.withAllScales(this.scales[0], this.scales[1], z, this.scales[3]);
  }

  withUScale(u: number): ScalePoint<P> {
    return this.withAllScales(this.scales[0], this.scales[1], this.scales[2], u);
  }

  /** Same factor on every axis. */
  withScale(scale: number): ScalePoint<P> {
    return this.withAllScales(scale, scale, scale, scale);
  }

  withAllScales(x: number, y: number, z: number, u: number): ScalePoint<P> {
    return new ScalePoint(this.source, [x, y, z, u]);
  }

  get(point: P): number {
    return this.source.get(mapPoint(point, (c, axis) => c * this.scales[axis]));
  }
}
