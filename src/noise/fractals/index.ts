export {
  Fractal,
  DEFAULT_SEED,
  DEFAULT_LAYERS,
  DEFAULT_LACUNARITY,
  DEFAULT_FREQUENCY,
  MAX_LAYERS,
} from './fractal';
export {
  DEFAULT_PERSISTENCE,
  HomogeneousBlender,
  HeterogeneousBlender,
  RidgedBlender,
  BillowBlender,
  type LayerBlender,
} from './blenders';
