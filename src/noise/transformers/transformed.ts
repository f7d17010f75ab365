/**
 * Point transforms and the node that applies one before delegating to a
 * source.
 */

import { scalePoint, type Point } from '../../math';
import type { NoiseFn, Seedable } from '../noiseFn';

export interface PointTransform {
  transform<Q extends Point>(point: Q): Q;
}

/** Scales every axis by the same factor. */
export class UniformScale implements PointTransform {
  constructor(public readonly scale: number = 1.0) {}

  transform<Q extends Point>(point: Q): Q {
    return scalePoint(point, this.scale);
  }
}

/**
 * Noise function that evaluates `source` at `transform(point)`.
 */
export class Transformed<
  P extends Point = Point,
  S extends NoiseFn<P> = NoiseFn<P>,
  T extends PointTransform = PointTransform,
> implements NoiseFn<P> {
  constructor(
    public readonly source: S,
    public readonly transform: T,
  ) {}

  withTransform<NT extends PointTransform>(transform: NT): Transformed<P, S, NT> {
    return new Transformed<P, S, NT>(this.source, transform);
  }

  /** Reseed the wrapped source, keeping the transform. */
  withSeed<SS extends NoiseFn<P> & Seedable<SS>>(this: Transformed<P, SS, T>, seed: number): Transformed<P, SS, T> {
    return new Transformed<P, SS, T>(this.source.withSeed(seed), this.transform);
  }

  getSeed<SS extends NoiseFn<P> & Seedable<SS>>(this: Transformed<P, SS, T>): number {
    return this.source.getSeed();
  }

  get(point: P): number {
    return this.source.get(this.transform.transform(point));
  }
}

/** Wrap `source` so it is evaluated at `point * factor`. */
export function scaled<P extends Point, S extends NoiseFn<P>>(source: S, factor: number): Transformed<P, S, UniformScale> {
  return new Transformed<P, S, UniformScale>(source, new UniformScale(factor));
}

export function transformed<P extends Point, S extends NoiseFn<P>, T extends PointTransform>(
  source: S,
  transform: T,
): Transformed<P, S, T> {
  return new Transformed<P, S, T>(source, transform);
}
