/**
 * Blend strategies: fold the ordered layer values of a fractal into one
 * scalar. Layer k is weighted by persistence^k.
 */

import { clamp } from '../../math';

export interface LayerBlender<Self> {
  readonly persistence: number;
  withPersistence(persistence: number): Self;
  blend(values: readonly number[]): number;
}

export const DEFAULT_PERSISTENCE = 0.5;

/** Plain weighted sum (fBm). */
export class HomogeneousBlender implements LayerBlender<HomogeneousBlender> {
  constructor(public readonly persistence: number = DEFAULT_PERSISTENCE) {}

  withPersistence(persistence: number): HomogeneousBlender {
    return new HomogeneousBlender(persistence);
  }

  blend(values: readonly number[]): number {
    let result = 0;
    let amplitude = 1;
    for (const value of values) {
      result += value * amplitude;
      amplitude *= this.persistence;
    }
    return result;
  }
}

/**
 * Multifractal sum: each layer's contribution is scaled by the running
 * result, so detail is stronger where the lower layers are already high.
 */
export class HeterogeneousBlender implements LayerBlender<HeterogeneousBlender> {
  constructor(public readonly persistence: number = DEFAULT_PERSISTENCE) {}

  withPersistence(persistence: number): HeterogeneousBlender {
    return new HeterogeneousBlender(persistence);
  }

  blend(values: readonly number[]): number {
    if (values.length === 0) {
      return 0;
    }

    let result = values[0];
    let amplitude = 1;
    for (let k = 1; k < values.length; k++) {
      amplitude *= this.persistence;
      result += values[k] * amplitude * result;
    }
    return result;
  }
}

export class RidgedBlender implements LayerBlender<RidgedBlender> {
  static readonly DEFAULT_ATTENUATION = 2.0;

  constructor(
    public readonly persistence: number = DEFAULT_PERSISTENCE,
    public readonly attenuation: number = RidgedBlender.DEFAULT_ATTENUATION,
  ) {}

  withPersistence(persistence: number): RidgedBlender {
    return new RidgedBlender(persistence, this.attenuation);
  }

  withAttenuation(attenuation: number): RidgedBlender {
    return new RidgedBlender(this.persistence, attenuation);
  }

  blend(values: readonly number[]): number {
    let result = 0;
    let weight = 1;
    let amplitude = 1;

    for (const value of values) {
      // Fold into ridges, sharpened where the previous layer was high
      const ridge = 1 - Math.abs(value);
      const signal = ridge * ridge * weight;
      weight = clamp(signal / this.attenuation, 0, 1);

      result += signal * amplitude;
      amplitude *= this.persistence;
    }

    return result;
  }
}

/** Sum of folded layers, giving puffy, cloud-like shapes. */
export class BillowBlender implements LayerBlender<BillowBlender> {
  constructor(public readonly persistence: number = DEFAULT_PERSISTENCE) {}

  withPersistence(persistence: number): BillowBlender {
    return new BillowBlender(persistence);
  }

  blend(values: readonly number[]): number {
    let result = 0;
    let amplitude = 1;
    for (const value of values) {
      result += (2 * Math.abs(value) - 1) * amplitude;
      amplitude *= this.persistence;
    }
    return result;
  }
}
