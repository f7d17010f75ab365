/**
 * Binary combiners.
 *
 * One node type covers every arithmetic combination of two sources; the
 * operation is injected by name so the family stays a single class.
 */

import type { Point } from '../math';
import type { NoiseFn } from './noiseFn';

export type BinaryOperationName = 'add' | 'multiply' | 'power' | 'min' | 'max';

export const BINARY_OPERATIONS: Record<BinaryOperationName, (a: number, b: number) => number> = {
  add: (a, b) => a + b,
  multiply: (a, b) => a * b,
  power: (a, b) => Math.pow(a, b),
  min: (a, b) => Math.min(a, b),
  max: (a, b) => Math.max(a, b),
};

/**
 * Noise function that outputs `operation(source1(p), source2(p))`, both
 * sources evaluated at the same point.
 */
export class Combiner<P extends Point = Point> implements NoiseFn<P> {
  constructor(
    public readonly source1: NoiseFn<P>,
    public readonly source2: NoiseFn<P>,
    public readonly operation: BinaryOperationName,
  ) {}

  withSource1(source1: NoiseFn<P>): Combiner<P> {
    return new Combiner(source1, this.source2, this.operation);
  }

  withSource2(source2: NoiseFn<P>): Combiner<P> {
    return new Combiner(this.source1, source2, this.operation);
  }

  withOperation(operation: BinaryOperationName): Combiner<P> {
    return new Combiner(this.source1, this.source2, operation);
  }

  get(point: P): number {
    return BINARY_OPERATIONS[this.operation](this.source1.get(point), this.source2.get(point));
  }
}

export function add<P extends Point>(source1: NoiseFn<P>, source2: NoiseFn<P>): Combiner<P> {
  return new Combiner(source1, source2, 'add');
}

export function multiply<P extends Point>(source1: NoiseFn<P>, source2: NoiseFn<P>): Combiner<P> {
  return new Combiner(source1, source2, 'multiply');
}

/** `source1(p) ^ source2(p)` */
export function power<P extends Point>(source1: NoiseFn<P>, source2: NoiseFn<P>): Combiner<P> {
  return new Combiner(source1, source2, 'power');
}

export function min<P extends Point>(source1: NoiseFn<P>, source2: NoiseFn<P>): Combiner<P> {
  return new Combiner(source1, source2, 'min');
}

export function max<P extends Point>(source1: NoiseFn<P>, source2: NoiseFn<P>): Combiner<P> {
  return new Combiner(source1, source2, 'max');
}
