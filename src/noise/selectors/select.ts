import { lerp, sCurve3, type Point } from '../../math';
import type { NoiseFn } from '../noiseFn';

/**
 * Noise function that outputs `source2` where the control value lies in the
 * selection range `[lower, upper]` and `source1` elsewhere.
 *
 * With a positive falloff the switch is eased with a cubic s-curve across
 * `[lower - falloff, lower + falloff)` and `[upper - falloff, upper + falloff)`.
 * The bands are tested in that order, so a falloff wider than half the
 * selection width lets the lower band take over the middle of the range.
 */
export class Select<P extends Point = Point> implements NoiseFn<P> {
  static readonly DEFAULT_BOUNDS: readonly [number, number] = [0.0, 1.0];
  static readonly DEFAULT_FALLOFF = 0.0;

  constructor(
    public readonly source1: NoiseFn<P>,
    public readonly source2: NoiseFn<P>,
    public readonly control: NoiseFn<P>,
    public readonly bounds: readonly [number, number] = Select.DEFAULT_BOUNDS,
    public readonly falloff: number = Select.DEFAULT_FALLOFF,
  ) {}

  withBounds(lower: number, upper: number): Select<P> {
    return new Select(this.source1, this.source2, this.control, [lower, upper], this.falloff);
  }

  withFalloff(falloff: number): Select<P> {
    return new Select(this.source1, this.source2, this.control, this.bounds, falloff);
  }

  get(point: P): number {
    const controlValue = this.control.get(point);
    const [lower, upper] = this.bounds;
    const falloff = this.falloff;

    if (falloff > 0.0) {
      if (controlValue < lower - falloff) {
        return this.source1.get(point);
      }
      if (controlValue < lower + falloff) {
        const alpha = sCurve3((controlValue - (lower - falloff)) / (2 * falloff));
        return lerp(this.source1.get(point), this.source2.get(point), alpha);
      }
      if (controlValue < upper - falloff) {
        return this.source2.get(point);
      }
      if (controlValue < upper + falloff) {
        const alpha = sCurve3((controlValue - (upper - falloff)) / (2 * falloff));
        return lerp(this.source2.get(point), this.source1.get(point), alpha);
      }
      return this.source1.get(point);
    }

    if (controlValue < lower || controlValue > upper) {
      return this.source1.get(point);
    }
    return this.source2.get(point);
  }
}
