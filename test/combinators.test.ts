import {
  Abs,
  Blend,
  Clamp,
  Combiner,
  Constant,
  Exponent,
  Negate,
  Perlin,
  ScaleBias,
  Select,
  add,
  max,
  min,
  multiply,
  power,
  type Point,
} from '../src/noise';

const POINTS: Point[] = [
  [0.3, 1.7],
  [-2.25, 4.5, 0.125],
  [1.1, -2.2, 3.3, -4.4],
];

describe('Combiners', () => {
  it('should apply each operation to constants', () => {
    const two = new Constant(2);
    const three = new Constant(3);

    expect(add(two, three).get([0, 0])).toBe(5);
    expect(multiply(two, three).get([0, 0])).toBe(6);
    expect(power(two, three).get([0, 0])).toBe(8);
    expect(min(two, three).get([0, 0])).toBe(2);
    expect(max(two, three).get([0, 0])).toBe(3);
  });

  it('should combine generators pointwise', () => {
    const a = new Perlin(1);
    const b = new Perlin(2);

    for (const point of POINTS) {
      expect(add(a, b).get(point)).toBe(a.get(point) + b.get(point));
      expect(min(a, b).get(point)).toBe(Math.min(a.get(point), b.get(point)));
      expect(max(a, b).get(point)).toBe(Math.max(a.get(point), b.get(point)));
    }
  });

  it('should swap operation and sources through builders', () => {
    const combiner = new Combiner(new Constant(4), new Constant(2), 'add');

    expect(combiner.withOperation('multiply').get([0, 0])).toBe(8);
    expect(combiner.withSource1(new Constant(10)).get([0, 0])).toBe(12);
    expect(combiner.withSource2(new Constant(-4)).get([0, 0])).toBe(0);
    expect(combiner.operation).toBe('add');
  });
});

describe('Modifiers', () => {
  it('Abs and Negate should fold and flip the source', () => {
    expect(new Abs(new Constant(-0.75)).get([1, 1])).toBe(0.75);
    expect(new Negate(new Constant(0.75)).get([1, 1])).toBe(-0.75);
  });

  it('ScaleBias should apply value * scale + bias', () => {
    const node = new ScaleBias(new Constant(1)).withScale(2).withBias(0.5);
    expect(node.get([0, 0])).toBe(2.5);
    expect(node.get([9, 9, 9, 9])).toBe(2.5);
  });

  it('ScaleBias should default to the identity', () => {
    const perlin = new Perlin(4);
    const node = new ScaleBias(perlin);
    for (const point of POINTS) {
      expect(node.get(point)).toBe(perlin.get(point));
    }
  });

  describe('Clamp', () => {
    it('should saturate at the default bounds', () => {
      expect(new Clamp(new Constant(5)).get([0, 0])).toBe(1);
      expect(new Clamp(new Constant(-3)).get([0, 0])).toBe(-1);
      expect(new Clamp(new Constant(0.3)).get([0, 0])).toBe(0.3);
    });

    it('should honour custom bounds', () => {
      const clamp = new Clamp(new Constant(0.9)).withBounds(-0.5, 0.5);
      expect(clamp.get([0, 0])).toBe(0.5);
      expect(clamp.withLowerBound(0.95).withUpperBound(2).get([0, 0])).toBe(0.95);
    });

    it('should be idempotent', () => {
      const source = new ScaleBias(new Perlin(6)).withScale(4);
      const once = new Clamp(source).withBounds(-0.25, 0.5);
      const twice = new Clamp(once).withBounds(-0.25, 0.5);
      for (const point of POINTS) {
        expect(twice.get(point)).toBe(once.get(point));
      }
    });

    it('should return the upper bound when the bounds are inverted', () => {
      expect(new Clamp(new Constant(0)).withBounds(1, -1).get([0, 0])).toBe(-1);
    });
  });

  describe('Exponent', () => {
    it('should curve the rescaled source', () => {
      expect(new Exponent(new Constant(0)).withExponent(2).get([0, 0])).toBe(-0.5);
      expect(new Exponent(new Constant(1)).withExponent(3).get([0, 0])).toBe(1);
      expect(new Exponent(new Constant(-1)).withExponent(3).get([0, 0])).toBe(-1);
    });

    it('should be close to the identity with exponent 1', () => {
      expect(new Exponent(new Constant(0.3)).get([0, 0])).toBeCloseTo(0.3, 12);
    });
  });
});

describe('Selectors', () => {
  const low = new Constant(-1);
  const high = new Constant(1);

  describe('Blend', () => {
    it('should interpolate by the control value', () => {
      const from = new Constant(0);
      const to = new Constant(4);

      expect(new Blend(from, to, new Constant(0)).get([0, 0])).toBe(0);
      expect(new Blend(from, to, new Constant(1)).get([0, 0])).toBe(4);
      expect(new Blend(from, to, new Constant(0.25)).get([0, 0])).toBe(1);
    });

    it('should extrapolate outside [0, 1]', () => {
      expect(new Blend(new Constant(0), new Constant(4), new Constant(2)).get([0, 0])).toBe(8);
    });
  });

  describe('Select', () => {
    const select = (control: number) => new Select(low, high, new Constant(control));

    it('should pick source2 inside the range and source1 outside', () => {
      expect(select(0.5).get([0, 0])).toBe(1);
      expect(select(-0.1).get([0, 0])).toBe(-1);
      expect(select(1.5).get([0, 0])).toBe(-1);
    });

    it('should include both bounds in the selection range', () => {
      expect(select(0).get([0, 0])).toBe(1);
      expect(select(1).get([0, 0])).toBe(1);
    });

    it('should honour custom bounds', () => {
      expect(select(0.5).withBounds(0.6, 0.9).get([0, 0])).toBe(-1);
      expect(select(0.7).withBounds(0.6, 0.9).get([0, 0])).toBe(1);
    });

    it('should ease across the edges with a falloff', () => {
      const soft = select(0).withFalloff(0.2);
      expect(soft.get([0, 0])).toBe(0);
      expect(select(-0.3).withFalloff(0.2).get([0, 0])).toBe(-1);
      expect(select(0.5).withFalloff(0.2).get([0, 0])).toBe(1);
    });

    it('should let a wide falloff ease across the middle of the range', () => {
      const wide = new Select(new Constant(0), new Constant(1), new Constant(0.5)).withFalloff(0.8);
      // alpha = (0.5 + 0.8) / 1.6 = 0.8125, eased to 0.8125² · (3 - 1.625)
      expect(wide.get([0, 0])).toBeCloseTo(0.90771484375, 12);
    });

    it('should leave the upper band when the falloff overlaps both edges', () => {
      const wide = new Select(new Constant(0), new Constant(1), new Constant(1.1)).withFalloff(0.8);
      // 1.1 lies in [upper - 0.8, upper + 0.8): alpha = 0.9 / 1.6 = 0.5625
      const alpha = 0.5625 * 0.5625 * (3 - 2 * 0.5625);
      expect(wide.get([0, 0])).toBeCloseTo(1 - alpha, 12);
    });
  });
});
