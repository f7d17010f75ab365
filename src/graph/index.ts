export {
  NodeSchema,
  NodeUnionSchema,
  SeedableGeneratorSchema,
  PointSchema,
  SampleRequestSchema,
  type NodeDescription,
  type NodeType,
  type SeedInput,
  type SeedableGeneratorDescription,
  type BlendMode,
  type SampleRequest,
} from './schema';
export { buildNode, childrenOf, measureDepth, supportedDimensions, GuardedSuperSimplex, type BuildOptions } from './build';
export { listNodeTypes, type NodeFieldInfo, type NodeTypeInfo } from './catalog';
