export { Constant } from './constant';
export { Checkerboard } from './checkerboard';
export { Cylinders } from './cylinders';
export { Perlin } from './perlin';
export { PerlinSurflet } from './perlinSurflet';
export { Value } from './value';
export { OpenSimplex } from './openSimplex';
export { SuperSimplex, type SuperSimplexPoint } from './superSimplex';
export {
  Worley,
  type WorleyReturnType,
  type DistanceFunctionName,
  DISTANCE_FUNCTIONS,
} from './worley';
