export { Transformed, UniformScale, scaled, transformed, type PointTransform } from './transformed';
export { ScalePoint } from './scalePoint';
export { TranslatePoint } from './translatePoint';
export { RotatePoint, rotationMatrix } from './rotatePoint';
export { Turbulence, TURBULENCE_OFFSETS, type DisplacementField } from './turbulence';
