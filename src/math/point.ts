/**
 * Sample points
 *
 * Every noise node is evaluated at a fixed-arity coordinate tuple. The union
 * `Point` is dispatched on tuple length; a node's generic parameter narrows it
 * to the arities the node actually implements.
 */

export type Point2 = readonly [number, number];
export type Point3 = readonly [number, number, number];
export type Point4 = readonly [number, number, number, number];

export type Point = Point2 | Point3 | Point4;

export type Dimension = Point['length'];

export const DIMENSIONS: readonly Dimension[] = [2, 3, 4];

/**
 * Apply `fn` to every coordinate, keeping the arity of the input tuple.
 */
export function mapPoint<P extends Point>(point: P, fn: (coord: number, axis: number) => number): P;
export function mapPoint(point: Point, fn: (coord: number, axis: number) => number): Point {
  switch (point.length) {
    case 2:
      return [fn(point[0], 0), fn(point[1], 1)];
    case 3:
      return [fn(point[0], 0), fn(point[1], 1), fn(point[2], 2)];
    case 4:
      return [fn(point[0], 0), fn(point[1], 1), fn(point[2], 2), fn(point[3], 3)];
  }
}

export function scalePoint<P extends Point>(point: P, factor: number): P {
  return mapPoint(point, (c) => c * factor);
}

export function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function magnitudeSquared(v: readonly number[]): number {
  return dot(v, v);
}
