import { mapPoint, type Point } from '../../math';
import type { NoiseFn } from '../noiseFn';

type AxisValues = readonly [number, number, number, number];

/**
 * Noise function that moves the point by a per-axis offset before evaluating
 * the source.
 */
export class TranslatePoint<P extends Point = Point> implements NoiseFn<P> {
  static readonly DEFAULT_TRANSLATIONS: AxisValues = [0.0, 0.0, 0.0, 0.0];

  constructor(
    public readonly source: NoiseFn<P>,
    public readonly translations: AxisValues = TranslatePoint.DEFAULT_TRANSLATIONS,
  ) {}

  withXTranslation(x: number): TranslatePoint<P> {
    const [, y, z, u] = this.translations;
    return this.withAllTranslations(x, y, z, u);
  }

  withYTranslation(y: number): TranslatePoint<P> {
    const [x, , z, u] = this.translations;
    return this.withAllTranslations(x, y, z, u);
  }

  withZTranslation(z: number): TranslatePoint<P> {
    const [x, y, , u] = this.translations;
    return this.withAllTranslations(x, y, z, u);
  }

  withUTranslation(u: number): TranslatePoint<P> {
    const [x, y, z] = this.translations;
    return this.withAllTranslations(x, y, z, u);
  }

  withTranslation(offset: number): TranslatePoint<P> {
    return this.withAllTranslations(offset, offset, offset, offset);
  }

  withAllTranslations(x: number, y: number, z: number, u: number): TranslatePoint<P> {
    return new TranslatePoint(this.source, [x, y, z, u]);
  }

  get(point: P): number {
    return this.source.get(mapPoint(point, (c, axis) => c + this.translations[axis]));
  }
}
