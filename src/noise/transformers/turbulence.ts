import { mapPoint, type Point } from '../../math';
import { deriveSeeds } from '../../rng';
import { EmptyLayerStackError } from '../errors';
import { Fractal } from '../fractals/fractal';
import { Perlin } from '../generators/perlin';
import type { NoiseFn, Seedable } from '../noiseFn';
import { Transformed, UniformScale } from './transformed';

// Fixed per-axis shifts so the four displacement fields sample unrelated
// regions even where their seeds would line up
export const TURBULENCE_OFFSETS: ReadonlyArray<readonly [number, number, number, number]> = [
  [12414, 65124, 31337, 57948],
  [26519, 18128, 60943, 48513],
  [53820, 11213, 44845, 39357],
  [18128, 44845, 12414, 60943],
].map(([a, b, c, d]) => [a / 65536, b / 65536, c / 65536, d / 65536] as const);

export type DisplacementField = Transformed<Point, Fractal<Point, Perlin>, UniformScale>;

/**
 * Domain warp: every coordinate is displaced by its own fractal Perlin field
 * before the source is evaluated.
 */
export class Turbulence<P extends Point = Point> implements NoiseFn<P>, Seedable<Turbulence<P>> {
  static readonly DEFAULT_SEED = 0;
  static readonly DEFAULT_FREQUENCY = 1.0;
  static readonly DEFAULT_POWER = 1.0;
  static readonly DEFAULT_ROUGHNESS = 3;

  /** One field per axis, seeded with the first four draws of the seed sequence */
  readonly fields: readonly DisplacementField[];

  constructor(
    public readonly source: NoiseFn<P>,
    public readonly seed: number = Turbulence.DEFAULT_SEED,
    public readonly frequency: number = Turbulence.DEFAULT_FREQUENCY,
    public readonly power: number = Turbulence.DEFAULT_POWER,
    public readonly roughness: number = Turbulence.DEFAULT_ROUGHNESS,
  ) {
    if (roughness === 0) {
      throw new EmptyLayerStackError('Turbulence');
    }

    const scale = new UniformScale(frequency);
    this.fields = deriveSeeds(seed, TURBULENCE_OFFSETS.length).map(
      (fieldSeed) => new Transformed(Fractal.create(new Perlin(), roughness).withSeed(fieldSeed), scale),
    );
  }

  withSeed(seed: number): Turbulence<P> {
    return new Turbulence(this.source, seed >>> 0, this.frequency, this.power, this.roughness);
  }

  getSeed(): number {
    return this.seed;
  }

  withFrequency(frequency: number): Turbulence<P> {
    return new Turbulence(this.source, this.seed, frequency, this.power, this.roughness);
  }

  withPower(power: number): Turbulence<P> {
    return new Turbulence(this.source, this.seed, this.frequency, power, this.roughness);
  }

  withRoughness(roughness: number): Turbulence<P> {
    return new Turbulence(this.source, this.seed, this.frequency, this.power, roughness);
  }

  /**
   * Point the source is evaluated at: axis i moves by field i sampled at the
   * point shifted by the i-th offset row, times `power`.
   */
  displace(point: P): P {
    return mapPoint(point, (c, axis) => {
      const shift = TURBULENCE_OFFSETS[axis];
      const sample = mapPoint(point, (p, i) => p + shift[i]);
      return c + this.fields[axis].get(sample) * this.power;
    });
  }

  get(point: P): number {
    if (this.power === 0) {
      return this.source.get(point);
    }

    return this.source.get(this.displace(point));
  }
}
