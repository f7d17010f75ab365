/**
 * Fractal layer stack.
 *
 * One seedable base generator is instantiated once per layer, each copy with
 * its own derived seed. Evaluation starts at `point * frequency`, samples
 * layer 0, moves the point through the transform (by default a uniform scale
 * by the lacunarity), samples layer 1, and so on. The blender folds the
 * ordered layer values into the result.
 *
 * @example
 * ```ts
 * const ridged = Fractal.create(new Perlin(), 8)
 *   .withBlender(new RidgedBlender())
 *   .withSeed(42);
 * ridged.get([0.5, 1.25]);
 * ```
 */

import { scalePoint, type Point } from '../../math';
import { deriveSeeds } from '../../rng';
import { EmptyLayerStackError } from '../errors';
import type { NoiseFn, Seedable } from '../noiseFn';
import { UniformScale, type PointTransform } from '../transformers/transformed';
import { DEFAULT_PERSISTENCE, HomogeneousBlender, type LayerBlender } from './blenders';

export const DEFAULT_SEED = 0xd0786b3e;
export const DEFAULT_LAYERS = 6;
export const DEFAULT_LACUNARITY = (2 * Math.PI) / 3;
export const DEFAULT_FREQUENCY = 1.0;
export const MAX_LAYERS = 32;

interface FractalState<F, B, T> {
  base: F;
  layers: readonly F[];
  transform: T;
  blender: B;
  seed: number;
  frequency: number;
}

function checkLayerCount(count: number): void {
  if (count === 0) {
    throw new EmptyLayerStackError('Fractal');
  }
  if (!Number.isInteger(count) || count < 0 || count > MAX_LAYERS) {
    throw new RangeError(`Fractal layer count must be an integer in 1..${MAX_LAYERS}, got ${count}`);
  }
}

function buildLayers<F extends Seedable<F>>(base: F, seed: number, count: number): F[] {
  return deriveSeeds(seed, count).map((layerSeed) => base.withSeed(layerSeed));
}

export class Fractal<
  P extends Point,
  F extends NoiseFn<P> & Seedable<F>,
  B extends LayerBlender<B> = HomogeneousBlender,
  T extends PointTransform = UniformScale,
> implements NoiseFn<P>, Seedable<Fractal<P, F, B, T>> {
  private constructor(private readonly state: FractalState<F, B, T>) {}

  /**
   * Stack `layers` copies of `base` with the default seed, homogeneous
   * blending and the default lacunarity.
   */
  static create<P extends Point, F extends NoiseFn<P> & Seedable<F>>(
    base: F,
    layers: number = DEFAULT_LAYERS,
  ): Fractal<P, F> {
    checkLayerCount(layers);
    return new Fractal<P, F>({
      base,
      layers: buildLayers(base, DEFAULT_SEED, layers),
      transform: new UniformScale(DEFAULT_LACUNARITY),
      blender: new HomogeneousBlender(DEFAULT_PERSISTENCE),
      seed: DEFAULT_SEED,
      frequency: DEFAULT_FREQUENCY,
    });
  }

  get base(): F {
    return this.state.base;
  }

  get transform(): T {
    return this.state.transform;
  }

  get blender(): B {
    return this.state.blender;
  }

  get frequency(): number {
    return this.state.frequency;
  }

  layerCount(): number {
    return this.state.layers.length;
  }

  layerSeeds(): number[] {
    return this.state.layers.map((layer) => layer.getSeed());
  }

  getSeed(): number {
    return this.state.seed;
  }

  /**
   * Resize the stack. Existing layers are kept; new layers continue the
   * same seed sequence, so layer k keeps its seed whatever the count.
   */
  withLayers(count: number): Fractal<P, F, B, T> {
    checkLayerCount(count);
    const { layers, base, seed } = this.state;

    if (count <= layers.length) {
      return this.with({ layers: layers.slice(0, count) });
    }

    const seeds = deriveSeeds(seed, count);
    const added = seeds.slice(layers.length).map((layerSeed) => base.withSeed(layerSeed));
    return this.with({ layers: [...layers, ...added] });
  }

  withSeed(seed: number): Fractal<P, F, B, T> {
    const normalized = seed >>> 0;
    return this.with({
      seed: normalized,
      layers: buildLayers(this.state.base, normalized, this.state.layers.length),
    });
  }

  /** Rebuild every layer from a new template, keeping the per-layer seeds. */
  withBase<G extends NoiseFn<P> & Seedable<G>>(base: G): Fractal<P, G, B, T> {
    const { seed, layers, transform, blender, frequency } = this.state;
    return new Fractal<P, G, B, T>({
      base,
      layers: buildLayers(base, seed, layers.length),
      transform,
      blender,
      seed,
      frequency,
    });
  }

  withPersistence(persistence: number): Fractal<P, F, B, T> {
    return this.with({ blender: this.state.blender.withPersistence(persistence) });
  }

  /** Replace the transform with a uniform scale by `lacunarity`. */
  withLacunarity(lacunarity: number): Fractal<P, F, B, UniformScale> {
    return this.withTransform(new UniformScale(lacunarity));
  }

  withTransform<U extends PointTransform>(transform: U): Fractal<P, F, B, U> {
    return new Fractal<P, F, B, U>({ ...this.state, transform });
  }

  withBlender<C extends LayerBlender<C>>(blender: C): Fractal<P, F, C, T> {
    return new Fractal<P, F, C, T>({ ...this.state, blender });
  }

  withFrequency(frequency: number): Fractal<P, F, B, T> {
    return this.with({ frequency });
  }

  get(point: P): number {
    let current = scalePoint(point, this.state.frequency);
    const values: number[] = [];

    for (const layer of this.state.layers) {
      values.push(layer.get(current));
      current = this.state.transform.transform(current);
    }

    return this.state.blender.blend(values);
  }

  private with(changes: Partial<FractalState<F, B, T>>): Fractal<P, F, B, T> {
    return new Fractal<P, F, B, T>({ ...this.state, ...changes });
  }
}
