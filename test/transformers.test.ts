import {
  Constant,
  EmptyLayerStackError,
  Fractal,
  Perlin,
  RotatePoint,
  ScalePoint,
  TURBULENCE_OFFSETS,
  TranslatePoint,
  Transformed,
  Turbulence,
  UniformScale,
  deriveSeeds,
  scaled,
  transformed,
  type NoiseFn,
  type Point,
  type Point2,
} from '../src/noise';

// Source that records every point it is evaluated at
function createProbe(): { probe: NoiseFn<Point>; seen: Point[] } {
  const seen: Point[] = [];
  return {
    probe: {
      get: (point: Point) => {
        seen.push(point);
        return point[0];
      },
    },
    seen,
  };
}

describe('Transformed', () => {
  it('should evaluate the source at the scaled point', () => {
    const { probe, seen } = createProbe();
    scaled(probe, 2).get([1, -3]);
    expect(seen).toEqual([[2, -6]]);
  });

  it('should accept any point transform', () => {
    const { probe, seen } = createProbe();
    transformed(probe, new UniformScale(0.5)).get([4, 8, 12]);
    expect(seen).toEqual([[2, 4, 6]]);
  });

  it('should reseed a seedable source and keep the transform', () => {
    const node = new Transformed(new Perlin(1), new UniformScale(3));
    const reseeded = node.withSeed(9);

    expect(reseeded.getSeed()).toBe(9);
    expect(reseeded.transform.scale).toBe(3);
    expect(reseeded.get([0.2, 0.4])).toBe(new Perlin(9).get([0.2 * 3, 0.4 * 3]));
  });
});

describe('ScalePoint', () => {
  it('should scale each axis by its own factor', () => {
    const { probe, seen } = createProbe();
    const node = new ScalePoint(probe).withAllScales(2, 3, 4, 5);

    node.get([1, 1]);
    node.get([1, 1, 1]);
    node.get([1, 1, 1, 1]);

    expect(seen).toEqual([[2, 3], [2, 3, 4], [2, 3, 4, 5]]);
  });

  it('should update one axis at a time', () => {
    const { probe, seen } = createProbe();
    new ScalePoint(probe).withYScale(10).withUScale(-1).get([1, 1, 1, 1]);
    expect(seen).toEqual([[1, 10, 1, -1]]);
  });

  it('should set every axis with withScale', () => {
    const node = new ScalePoint(new Constant(0)).withScale(7);
    expect(node.scales).toEqual([7, 7, 7, 7]);
    expect(node.withXScale(1).withZScale(2).scales).toEqual([1, 7, 2, 7]);
  });
});

describe('TranslatePoint', () => {
  it('should shift each axis by its own offset', () => {
    const { probe, seen } = createProbe();
    const node = new TranslatePoint(probe).withXTranslation(1).withYTranslation(-2).withZTranslation(0.5);

    node.get([0, 0]);
    node.get([0, 0, 0, 0]);

    expect(seen).toEqual([[1, -2], [1, -2, 0.5, 0]]);
  });

  it('should set every axis with withTranslation', () => {
    const node = new TranslatePoint(new Constant(0)).withTranslation(3).withUTranslation(4);
    expect(node.translations).toEqual([3, 3, 3, 4]);
  });
});

describe('RotatePoint', () => {
  function rotatedBy(node: RotatePoint<Point>, point: Point, seen: Point[]): Point {
    node.get(point);
    const last = seen[seen.length - 1];
    return last;
  }

  it('should rotate 2D points about the z axis', () => {
    const { probe, seen } = createProbe();
    const rotated = rotatedBy(new RotatePoint(probe).withZAngle(90), [1, 0], seen);

    expect(rotated).toHaveLength(2);
    expect(rotated[0]).toBeCloseTo(0, 12);
    expect(rotated[1]).toBeCloseTo(-1, 12);
  });

  it('should turn 3D points the same way about z', () => {
    const { probe, seen } = createProbe();
    const rotated = rotatedBy(new RotatePoint(probe).withZAngle(90), [1, 0, 0], seen);

    expect(rotated[0]).toBeCloseTo(0, 12);
    expect(rotated[1]).toBeCloseTo(-1, 12);
    expect(rotated[2]).toBeCloseTo(0, 12);
  });

  it('should rotate about x and keep the fourth coordinate', () => {
    const { probe, seen } = createProbe();
    const rotated = rotatedBy(new RotatePoint(probe).withXAngle(90), [0, 1, 0, 7], seen);

    expect(rotated).toHaveLength(4);
    expect(rotated[0]).toBeCloseTo(0, 12);
    expect(rotated[1]).toBeCloseTo(0, 12);
    expect(rotated[2]).toBeCloseTo(1, 12);
    expect(rotated[3]).toBe(7);
  });

  it('should leave points unchanged with zero angles', () => {
    const { probe, seen } = createProbe();
    new RotatePoint(probe).get([0.5, -2, 3]);
    expect(seen).toEqual([[0.5, -2, 3]]);
  });
});

describe('Turbulence', () => {
  const source = new Perlin(3);
  const points: Point[] = [
    [0.4, 1.9],
    [-3.2, 0.7, 5.5],
    [1.5, 2.5, -0.5, 4.25],
  ];

  it('should return the source value exactly when power is 0', () => {
    const turbulence = new Turbulence(source).withPower(0);
    for (const point of points) {
      expect(turbulence.get(point)).toBe(source.get(point));
    }
  });

  it('should move each axis by its own field sampled at the offset point', () => {
    const { probe, seen } = createProbe();
    const turbulence = new Turbulence(probe, 11, 1.5, 0.5);
    const point: Point2 = [0.4, 1.9];
    turbulence.get(point);

    const expected = point.map((c, axis) => {
      const shift = TURBULENCE_OFFSETS[axis];
      return c + turbulence.fields[axis].get([point[0] + shift[0], point[1] + shift[1]]) * 0.5;
    });
    expect(seen).toEqual([expected]);
    expect(turbulence.displace(point)).toEqual(expected);
  });

  it('should seed the four fields with distinct draws of the seed sequence', () => {
    const turbulence = new Turbulence(source, 11);
    const seeds = turbulence.fields.map((field) => field.getSeed());

    expect(seeds).toEqual(deriveSeeds(11, 4));
    expect(new Set(seeds).size).toBe(4);
  });

  it('should give every axis a different displacement', () => {
    const turbulence = new Turbulence(source, 11);
    const sample: Point2 = [0.3, 0.6];
    const values = turbulence.fields.map((field) => field.get(sample));

    expect(new Set(values).size).toBe(4);
  });

  it('should scale the fields by the frequency', () => {
    const base = new Turbulence(source, 11);
    const faster = base.withFrequency(2);

    expect(faster.fields.map((field) => field.transform.scale)).toEqual([2, 2, 2, 2]);
    expect(faster.fields[0].get([0.3, 0.6])).toBe(base.fields[0].get([0.6, 1.2]));
    expect(faster.fields[3].get([0.3, 0.6])).toBe(base.fields[3].get([0.6, 1.2]));
  });

  it('should use the roughness as the layer count of every field', () => {
    const rough = new Turbulence(source, 11).withRoughness(5);
    const [firstSeed] = deriveSeeds(11, 1);

    expect(rough.fields.map((field) => field.source.layerCount())).toEqual([5, 5, 5, 5]);
    expect(rough.fields[0].get([0.3, 0.6])).toBe(Fractal.create(new Perlin(), 5).withSeed(firstSeed).get([0.3, 0.6]));
  });

  it('should propagate NaN coordinates', () => {
    expect(Number.isNaN(new Turbulence(source, 11).get([NaN, 0.5]))).toBe(true);
  });

  it('should be deterministic per seed', () => {
    const point: Point2 = [0.37, -1.21];
    expect(new Turbulence(source, 5).get(point)).toBe(new Turbulence(source, 5).get(point));
    expect(new Turbulence(source).withSeed(5).get(point)).toBe(new Turbulence(source, 5).get(point));
    expect(new Turbulence(source).withSeed(5).getSeed()).toBe(5);
  });

  it('should use the documented defaults', () => {
    const turbulence = new Turbulence(source);
    expect(turbulence.seed).toBe(0);
    expect(turbulence.frequency).toBe(1);
    expect(turbulence.power).toBe(1);
    expect(turbulence.roughness).toBe(3);
  });

  it('should reject zero roughness', () => {
    expect(() => new Turbulence(source).withRoughness(0)).toThrow(EmptyLayerStackError);
    expect(() => new Turbulence(source, 0, 1, 1, 0)).toThrow('Turbulence requires at least one layer');
  });
});
