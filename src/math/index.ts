export {
  type Point,
  type Point2,
  type Point3,
  type Point4,
  type Dimension,
  DIMENSIONS,
  mapPoint,
  scalePoint,
  dot,
  magnitudeSquared,
} from './point';

export { lerp, sCurve3, sCurve5, clamp, scaleShift } from './interpolate';
