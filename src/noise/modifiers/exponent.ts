import { scaleShift, type Point } from '../../math';
import type { NoiseFn } from '../noiseFn';

/**
 * Noise function that maps the output of its source onto an exponential
 * curve.
 *
 * Most sources output values in [-1, 1], so the value is first normalised to
 * [0, 1], raised to `exponent`, then rescaled back to [-1, 1].
 */
export class Exponent<P extends Point = Point> implements NoiseFn<P> {
  static readonly DEFAULT_EXPONENT = 1.0;

  constructor(
    public readonly source: NoiseFn<P>,
    public readonly exponent: number = Exponent.DEFAULT_EXPONENT,
  ) {}

  withExponent(exponent: number): Exponent<P> {
    return new Exponent(this.source, exponent);
  }

  get(point: P): number {
    const normalized = Math.abs((this.source.get(point) + 1.0) / 2.0);
    return scaleShift(Math.pow(normalized, this.exponent), 2.0);
  }
}
