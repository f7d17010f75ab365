import { lerp, type Point } from '../../math';
import type { NoiseFn } from '../noiseFn';

/**
 * Noise function that linearly interpolates from `source1` to `source2` by
 * the value of `control`.
 *
 * A control value of 0 yields `source1`, 1 yields `source2`; values outside
 * [0, 1] extrapolate.
 */
export class Blend<P extends Point = Point> implements NoiseFn<P> {
  constructor(
    public readonly source1: NoiseFn<P>,
    public readonly source2: NoiseFn<P>,
    public readonly control: NoiseFn<P>,
  ) {}

  get(point: P): number {
    const lower = this.source1.get(point);
    const upper = this.source2.get(point);
    const control = this.control.get(point);

    return lerp(lower, upper, control);
  }
}
