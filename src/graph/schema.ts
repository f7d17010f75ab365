import { z } from 'zod';

/**
 * JSON form of a noise graph. Every node is an object tagged by `type`;
 * children are nested descriptions. Omitted fields take the node's defaults.
 */

export type SeedInput = number | string;

export type SeedableGeneratorDescription =
  | { type: 'perlin'; seed?: SeedInput }
  | { type: 'perlinSurflet'; seed?: SeedInput }
  | { type: 'openSimplex'; seed?: SeedInput }
  | { type: 'superSimplex'; seed?: SeedInput }
  | { type: 'value'; seed?: SeedInput }
  | {
      type: 'worley';
      seed?: SeedInput;
      frequency?: number;
      returnType?: 'distance' | 'value' | 'secondDistance' | 'distanceDifference';
      distanceFunction?: 'euclidean' | 'euclideanSquared' | 'manhattan' | 'chebyshev';
    };

export type BlendMode = 'homogeneous' | 'heterogeneous' | 'ridged' | 'billow';

export type NodeDescription =
  | SeedableGeneratorDescription
  | { type: 'constant'; value: number }
  | { type: 'checkerboard'; size?: number }
  | { type: 'cylinders'; frequency?: number }
  | { type: 'add' | 'multiply' | 'power' | 'min' | 'max'; source1: NodeDescription; source2: NodeDescription }
  | { type: 'abs' | 'negate'; source: NodeDescription }
  | { type: 'clamp'; source: NodeDescription; lower?: number; upper?: number }
  | { type: 'exponent'; source: NodeDescription; exponent?: number }
  | { type: 'scaleBias'; source: NodeDescription; scale?: number; bias?: number }
  | { type: 'blend'; source1: NodeDescription; source2: NodeDescription; control: NodeDescription }
  | {
      type: 'select';
      source1: NodeDescription;
      source2: NodeDescription;
      control: NodeDescription;
      lower?: number;
      upper?: number;
      falloff?: number;
    }
  | { type: 'scale'; source: NodeDescription; factor: number }
  | { type: 'scalePoint' | 'translatePoint'; source: NodeDescription; x?: number; y?: number; z?: number; u?: number }
  | { type: 'rotatePoint'; source: NodeDescription; x?: number; y?: number; z?: number }
  | {
      type: 'turbulence';
      source: NodeDescription;
      seed?: SeedInput;
      frequency?: number;
      power?: number;
      roughness?: number;
    }
  | {
      type: 'fractal';
      base: SeedableGeneratorDescription;
      seed?: SeedInput;
      layers?: number;
      persistence?: number;
      lacunarity?: number;
      frequency?: number;
      blend?: BlendMode;
      attenuation?: number;
    };

export type NodeType = NodeDescription['type'];

const node: z.ZodType<NodeDescription> = z.lazy(() => NodeSchema);

const seed = z.union([z.number(), z.string().min(1)]).optional().describe('Seed; strings are hashed to a 32-bit integer');
const finite = z.number().finite();

const seeded = <T extends string>(type: T, description: string) =>
  z.object({ type: z.literal(type), seed }).strict().describe(description);

export const PerlinNodeSchema = seeded('perlin', 'Gradient noise on the integer lattice');
export const PerlinSurfletNodeSchema = seeded('perlinSurflet', 'Gradient noise summed from radial surflets');
export const OpenSimplexNodeSchema = seeded('openSimplex', 'Gradient noise on the simplex lattice');
export const SuperSimplexNodeSchema = seeded('superSimplex', 'Wide-kernel simplex noise (2D and 3D only)');
export const ValueNodeSchema = seeded('value', 'Interpolated lattice values');

export const WorleyNodeSchema = z.object({
  type: z.literal('worley'),
  seed,
  frequency: finite.optional().describe('Cells per unit (default 1)'),
  returnType: z.enum(['distance', 'value', 'secondDistance', 'distanceDifference']).optional()
    .describe('Quantity reported for the nearest feature points (default value)'),
  distanceFunction: z.enum(['euclidean', 'euclideanSquared', 'manhattan', 'chebyshev']).optional()
    .describe('Distance metric (default euclidean)'),
}).strict().describe('Cellular noise around per-cell feature points');

export const SeedableGeneratorSchema = z.discriminatedUnion('type', [
  PerlinNodeSchema,
  PerlinSurfletNodeSchema,
  OpenSimplexNodeSchema,
  SuperSimplexNodeSchema,
  ValueNodeSchema,
  WorleyNodeSchema,
]);

const combiner = <T extends 'add' | 'multiply' | 'power' | 'min' | 'max'>(type: T, description: string) =>
  z.object({ type: z.literal(type), source1: node, source2: node }).strict().describe(description);

const unary = <T extends 'abs' | 'negate'>(type: T, description: string) =>
  z.object({ type: z.literal(type), source: node }).strict().describe(description);

const axes = <T extends 'scalePoint' | 'translatePoint'>(type: T, description: string) =>
  z.object({
    type: z.literal(type),
    source: node,
    x: finite.optional().describe('X axis'),
    y: finite.optional().describe('Y axis'),
    z: finite.optional().describe('Z axis'),
    u: finite.optional().describe('Fourth axis'),
  }).strict().describe(description);

export const NodeUnionSchema = z.discriminatedUnion('type', [
  PerlinNodeSchema,
  PerlinSurfletNodeSchema,
  OpenSimplexNodeSchema,
  SuperSimplexNodeSchema,
  ValueNodeSchema,
  WorleyNodeSchema,

  z.object({
    type: z.literal('constant'),
    value: finite.describe('Output value'),
  }).strict().describe('Same value everywhere'),

  z.object({
    type: z.literal('checkerboard'),
    size: z.number().int().min(0).max(30).optional().describe('Log2 of the block edge length (default 0)'),
  }).strict().describe('Alternating +1/-1 blocks'),

  z.object({
    type: z.literal('cylinders'),
    frequency: finite.optional().describe('Rings per unit (default 1)'),
  }).strict().describe('Concentric rings around the origin'),

  combiner('add', 'source1 + source2'),
  combiner('multiply', 'source1 * source2'),
  combiner('power', 'source1 ^ source2'),
  combiner('min', 'Smaller of the two sources'),
  combiner('max', 'Larger of the two sources'),

  unary('abs', 'Absolute value of the source'),
  unary('negate', 'Negated source'),

  z.object({
    type: z.literal('clamp'),
    source: node,
    lower: finite.optional().describe('Lower bound (default -1)'),
    upper: finite.optional().describe('Upper bound (default 1)'),
  }).strict().describe('Source clamped to [lower, upper]'),

  z.object({
    type: z.literal('exponent'),
    source: node,
    exponent: finite.optional().describe('Exponent applied to the rescaled source (default 1)'),
  }).strict().describe('Exponential curve over the source'),

  z.object({
    type: z.literal('scaleBias'),
    source: node,
    scale: finite.optional().describe('Multiplier (default 1)'),
    bias: finite.optional().describe('Offset (default 0)'),
  }).strict().describe('source * scale + bias'),

  z.object({
    type: z.literal('blend'),
    source1: node,
    source2: node,
    control: node,
  }).strict().describe('Linear blend of two sources weighted by a control'),

  z.object({
    type: z.literal('select'),
    source1: node,
    source2: node,
    control: node,
    lower: finite.optional().describe('Lower bound of the selection range (default 0)'),
    upper: finite.optional().describe('Upper bound of the selection range (default 1)'),
    falloff: z.number().min(0).optional().describe('Width of the eased edge (default 0)'),
  }).strict().describe('source2 where the control is in range, source1 elsewhere'),

  z.object({
    type: z.literal('scale'),
    source: node,
    factor: finite.describe('Uniform scale applied to the point'),
  }).strict().describe('Source evaluated at point * factor'),

  axes('scalePoint', 'Per-axis point scale'),
  axes('translatePoint', 'Per-axis point translation'),

  z.object({
    type: z.literal('rotatePoint'),
    source: node,
    x: finite.optional().describe('Angle about the x axis in degrees'),
    y: finite.optional().describe('Angle about the y axis in degrees'),
    z: finite.optional().describe('Angle about the z axis in degrees'),
  }).strict().describe('Point rotated around the origin'),

  z.object({
    type: z.literal('turbulence'),
    source: node,
    seed,
    frequency: finite.optional().describe('Frequency of the displacement fields (default 1)'),
    power: finite.optional().describe('Displacement scale (default 1)'),
    roughness: z.number().int().min(1).max(32).optional().describe('Layers per displacement field (default 3)'),
  }).strict().describe('Source evaluated at a noise-displaced point'),

  z.object({
    type: z.literal('fractal'),
    base: SeedableGeneratorSchema,
    seed,
    layers: z.number().int().min(1).max(32).optional().describe('Layer count (default 6)'),
    persistence: finite.optional().describe('Per-layer amplitude factor (default 0.5)'),
    lacunarity: finite.optional().describe('Per-layer frequency factor (default 2π/3)'),
    frequency: finite.optional().describe('Frequency of the first layer (default 1)'),
    blend: z.enum(['homogeneous', 'heterogeneous', 'ridged', 'billow']).optional()
      .describe('Blend strategy (default homogeneous)'),
    attenuation: z.number().positive().optional().describe('Ridged weight attenuation (default 2)'),
  }).strict().describe('Layered copies of a seedable generator'),
]);

export const NodeSchema: z.ZodType<NodeDescription> = NodeUnionSchema;

export const PointSchema = z.union([
  z.tuple([finite, finite]),
  z.tuple([finite, finite, finite]),
  z.tuple([finite, finite, finite, finite]),
]);

export const SampleRequestSchema = z.object({
  graph: NodeSchema,
  points: z.array(PointSchema).min(1).describe('Points to evaluate, all of the same arity'),
}).strict();

export type SampleRequest = z.output<typeof SampleRequestSchema>;
