import { DIMENSIONS, type Dimension, type Point } from '../math';
import { normalizeSeed } from '../rng';
import {
  Abs,
  BillowBlender,
  Blend,
  Checkerboard,
  Clamp,
  Combiner,
  Constant,
  Cylinders,
  DEFAULT_LACUNARITY,
  DEFAULT_LAYERS,
  DEFAULT_PERSISTENCE,
  Exponent,
  Fractal,
  HeterogeneousBlender,
  Negate,
  OpenSimplex,
  Perlin,
  PerlinSurflet,
  RidgedBlender,
  RotatePoint,
  ScaleBias,
  ScalePoint,
  Select,
  SuperSimplex,
  TranslatePoint,
  Turbulence,
  UnsupportedDimensionError,
  Value,
  Worley,
  scaled,
  type NoiseFn,
  type Seedable,
} from '../noise';
import type { NodeDescription, SeedInput, SeedableGeneratorDescription } from './schema';

export interface BuildOptions {
  /** Seed used by seeded nodes whose description gives none */
  defaultSeed?: number;
}

/**
 * SuperSimplex accepting any point: 4D points raise UnsupportedDimensionError.
 */
export class GuardedSuperSimplex implements NoiseFn<Point>, Seedable<GuardedSuperSimplex> {
  constructor(private readonly inner: SuperSimplex) {}

  withSeed(seed: number): GuardedSuperSimplex {
    return new GuardedSuperSimplex(this.inner.withSeed(seed));
  }

  getSeed(): number {
    return this.inner.getSeed();
  }

  get(point: Point): number {
    if (point.length === 4) {
      throw new UnsupportedDimensionError('superSimplex', 4);
    }
    return this.inner.get(point);
  }
}

function resolveSeed(seed: SeedInput | undefined, fallback: number, options: BuildOptions): number {
  if (seed !== undefined) {
    return normalizeSeed(seed);
  }
  return options.defaultSeed ?? fallback;
}

function buildFractal<F extends NoiseFn<Point> & Seedable<F>>(
  base: F,
  description: Extract<NodeDescription, { type: 'fractal' }>,
  options: BuildOptions,
): NoiseFn<Point> {
  const fractal = Fractal.create(base, description.layers ?? DEFAULT_LAYERS)
    .withFrequency(description.frequency ?? 1.0)
    .withLacunarity(description.lacunarity ?? DEFAULT_LACUNARITY)
    .withPersistence(description.persistence ?? DEFAULT_PERSISTENCE);

  const seeded = description.seed !== undefined || options.defaultSeed !== undefined
    ? fractal.withSeed(resolveSeed(description.seed, fractal.getSeed(), options))
    : fractal;

  const persistence = seeded.blender.persistence;
  switch (description.blend ?? 'homogeneous') {
    case 'homogeneous':
      return seeded;
    case 'heterogeneous':
      return seeded.withBlender(new HeterogeneousBlender(persistence));
    case 'ridged':
      return seeded.withBlender(new RidgedBlender(persistence, description.attenuation ?? RidgedBlender.DEFAULT_ATTENUATION));
    case 'billow':
      return seeded.withBlender(new BillowBlender(persistence));
  }
}

function buildFractalNode(description: Extract<NodeDescription, { type: 'fractal' }>, options: BuildOptions): NoiseFn<Point> {
  // Base seeds are replaced by the layer seeds, so only the kind matters
  const base = description.base;
  switch (base.type) {
    case 'perlin':
      return buildFractal(new Perlin(), description, options);
    case 'perlinSurflet':
      return buildFractal(new PerlinSurflet(), description, options);
    case 'openSimplex':
      return buildFractal(new OpenSimplex(), description, options);
    case 'superSimplex':
      return buildFractal(new GuardedSuperSimplex(new SuperSimplex()), description, options);
    case 'value':
      return buildFractal(new Value(), description, options);
    case 'worley':
      return buildFractal(buildWorley(base, options), description, options);
  }
}

function buildWorley(description: Extract<SeedableGeneratorDescription, { type: 'worley' }>, options: BuildOptions): Worley {
  return new Worley(
    resolveSeed(description.seed, Worley.DEFAULT_SEED, options),
    description.frequency,
    description.returnType,
    description.distanceFunction,
  );
}

/**
 * Turn a validated description into a live node.
 *
 * Construction faults (EmptyLayerStackError, RangeError) propagate to the
 * caller.
 */
export function buildNode(description: NodeDescription, options: BuildOptions = {}): NoiseFn<Point> {
  const child = (d: NodeDescription) => buildNode(d, options);

  switch (description.type) {
    case 'constant':
      return new Constant(description.value);
    case 'checkerboard':
      return new Checkerboard(description.size);
    case 'cylinders':
      return new Cylinders(description.frequency);
    case 'perlin':
      return new Perlin(resolveSeed(description.seed, Perlin.DEFAULT_SEED, options));
    case 'perlinSurflet':
      return new PerlinSurflet(resolveSeed(description.seed, PerlinSurflet.DEFAULT_SEED, options));
    case 'openSimplex':
      return new OpenSimplex(resolveSeed(description.seed, OpenSimplex.DEFAULT_SEED, options));
    case 'superSimplex':
      return new GuardedSuperSimplex(new SuperSimplex(resolveSeed(description.seed, SuperSimplex.DEFAULT_SEED, options)));
    case 'value':
      return new Value(resolveSeed(description.seed, Value.DEFAULT_SEED, options));
    case 'worley':
      return buildWorley(description, options);

    case 'add':
    case 'multiply':
    case 'power':
    case 'min':
    case 'max':
      return new Combiner(child(description.source1), child(description.source2), description.type);

    case 'abs':
      return new Abs(child(description.source));
    case 'negate':
      return new Negate(child(description.source));
    case 'clamp':
      return new Clamp(child(description.source), [
        description.lower ?? Clamp.DEFAULT_BOUNDS[0],
        description.upper ?? Clamp.DEFAULT_BOUNDS[1],
      ]);
    case 'exponent':
      return new Exponent(child(description.source), description.exponent);
    case 'scaleBias':
      return new ScaleBias(child(description.source), description.scale, description.bias);

    case 'blend':
      return new Blend(child(description.source1), child(description.source2), child(description.control));
    case 'select':
      return new Select(
        child(description.source1),
        child(description.source2),
        child(description.control),
        [description.lower ?? Select.DEFAULT_BOUNDS[0], description.upper ?? Select.DEFAULT_BOUNDS[1]],
        description.falloff,
      );

    case 'scale':
      return scaled(child(description.source), description.factor);
    case 'scalePoint': {
      const [x, y, z, u] = ScalePoint.DEFAULT_SCALES;
      return new ScalePoint(child(description.source), [
        description.x ?? x,
        description.y ?? y,
        description.z ?? z,
        description.u ?? u,
      ]);
    }
    case 'translatePoint': {
      const [x, y, z, u] = TranslatePoint.DEFAULT_TRANSLATIONS;
      return new TranslatePoint(child(description.source), [
        description.x ?? x,
        description.y ?? y,
        description.z ?? z,
        description.u ?? u,
      ]);
    }
    case 'rotatePoint':
      return new RotatePoint(child(description.source), [description.x ?? 0, description.y ?? 0, description.z ?? 0]);
    case 'turbulence':
      return new Turbulence(
        child(description.source),
        resolveSeed(description.seed, Turbulence.DEFAULT_SEED, options),
        description.frequency,
        description.power,
        description.roughness,
      );

    case 'fractal':
      return buildFractalNode(description, options);
  }
}

/** Direct children of a description, in field order. */
export function childrenOf(description: NodeDescription): NodeDescription[] {
  switch (description.type) {
    case 'add':
    case 'multiply':
    case 'power':
    case 'min':
    case 'max':
      return [description.source1, description.source2];
    case 'blend':
    case 'select':
      return [description.source1, description.source2, description.control];
    case 'abs':
    case 'negate':
    case 'clamp':
    case 'exponent':
    case 'scaleBias':
    case 'scale':
    case 'scalePoint':
    case 'translatePoint':
    case 'rotatePoint':
    case 'turbulence':
      return [description.source];
    case 'fractal':
      return [description.base];
    default:
      return [];
  }
}

/** Number of nodes on the longest root-to-leaf path. */
export function measureDepth(description: NodeDescription): number {
  return 1 + childrenOf(description).reduce((deepest, c) => Math.max(deepest, measureDepth(c)), 0);
}

/** Point arities every node in the description can evaluate. */
export function supportedDimensions(description: NodeDescription): Dimension[] {
  const own: readonly Dimension[] = description.type === 'superSimplex' ? [2, 3] : DIMENSIONS;
  return childrenOf(description).reduce<Dimension[]>(
    (dims, c) => {
      const childDims = supportedDimensions(c);
      return dims.filter((d) => childDims.includes(d));
    },
    [...own],
  );
}
