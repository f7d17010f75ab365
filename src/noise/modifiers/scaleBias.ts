import type { Point } from '../../math';
import type { NoiseFn } from '../noiseFn';

/**
 * Noise function that outputs `source(p) * scale + bias`.
 */
export class ScaleBias<P extends Point = Point> implements NoiseFn<P> {
  static readonly DEFAULT_SCALE = 1.0;
  static readonly DEFAULT_BIAS = 0.0;

  constructor(
    public readonly source: NoiseFn<P>,
    public readonly scale: number = ScaleBias.DEFAULT_SCALE,
    public readonly bias: number = ScaleBias.DEFAULT_BIAS,
  ) {}

  withScale(scale: number): ScaleBias<P> {
    return new ScaleBias(this.source, scale, this.bias);
  }

  withBias(bias: number): ScaleBias<P> {
    return new ScaleBias(this.source, this.scale, bias);
  }

  get(point: P): number {
    return this.source.get(point) * this.scale + this.bias;
  }
}
