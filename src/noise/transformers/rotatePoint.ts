import { mapPoint, type Point } from '../../math';
import type { NoiseFn } from '../noiseFn';

const DEG_TO_RAD = Math.PI / 180;

type Matrix3 = readonly [
  readonly [number, number, number],
  readonly [number, number, number],
  readonly [number, number, number],
];

/**
 * Rotation matrix for angles (degrees) about the x, y and z axes.
 */
export function rotationMatrix(xAngle: number, yAngle: number, zAngle: number): Matrix3 {
  const xCos = Math.cos(xAngle * DEG_TO_RAD);
  const yCos = Math.cos(yAngle * DEG_TO_RAD);
  const zCos = Math.cos(zAngle * DEG_TO_RAD);
  const xSin = Math.sin(xAngle * DEG_TO_RAD);
  const ySin = Math.sin(yAngle * DEG_TO_RAD);
  const zSin = Math.sin(zAngle * DEG_TO_RAD);

  return [
    [ySin * xSin * zSin + yCos * zCos, xCos * zSin, ySin * zCos - yCos * xSin * zSin],
    [ySin * xSin * zCos - yCos * zSin, xCos * zCos, -yCos * xSin * zCos - ySin * zSin],
    [-ySin * xCos, xSin, yCos * xCos],
  ];
}

/**
 * Noise function that rotates the point around the origin before evaluating
 * the source.
 *
 * 2D points turn about the z axis only. 3D points use the full x/y/z rotation;
 * 4D points rotate their first three coordinates and keep the fourth.
 */
export class RotatePoint<P extends Point = Point> implements NoiseFn<P> {
  private readonly matrix: Matrix3;

  constructor(
    public readonly source: NoiseFn<P>,
    public readonly angles: readonly [number, number, number] = [0, 0, 0],
  ) {
    this.matrix = rotationMatrix(angles[0], angles[1], angles[2]);
  }

  withAngles(x: number, y: number, z: number): RotatePoint<P> {
    return new RotatePoint(this.source, [x, y, z]);
  }

  withXAngle(x: number): RotatePoint<P> {
    return this.withAngles(x, this.angles[1], this.angles[2]);
  }

  withYAngle(y: number): RotatePoint<P> {
    return this.withAngles(this.angles[0], y, this.angles[2]);
  }

  withZAngle(z: number): RotatePoint<P> {
    return this.withAngles(this.angles[0], this.angles[1], z);
  }

  get(point: P): number {
    const rotated = this.rotate(point);
    return this.source.get(mapPoint(point, (_c, axis) => rotated[axis]));
  }

  private rotate(point: Point): number[] {
    if (point.length === 2) {
      const angle = this.angles[2] * DEG_TO_RAD;
      const cos = Math.cos(angle);
      const sin = Math.sin(angle);
      // Same sense as the z rotation of the 3D matrix
      return [point[0] * cos + point[1] * sin, point[1] * cos - point[0] * sin];
    }

    const [x, y, z] = point;
    const rows = this.matrix.map((row) => row[0] * x + row[1] * y + row[2] * z);
    return point.length === 4 ? [...rows, point[3]] : rows;
  }
}
