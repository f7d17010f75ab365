/**
 * Interpolation and easing curves shared by the generators and selectors.
 */

/** Linear interpolation; `alpha` is not clamped. */
export function lerp(a: number, b: number, alpha: number): number {
  return a + alpha * (b - a);
}

/** Cubic s-curve 3t² - 2t³ (C1 continuous). */
export function sCurve3(t: number): number {
  return t * t * (3 - 2 * t);
}

/** Quintic s-curve 6t⁵ - 15t⁴ + 10t³ (C2 continuous). */
export function sCurve5(t: number): number {
  return t * t * t * (t * (t * 6 - 15) + 10);
}

export function clamp(value: number, low: number, high: number): number {
  return Math.min(Math.max(value, low), high);
}

/**
 * Map a value in [0, 1] onto [-1, 1] after multiplying by `n / 2`:
 * `|value| * n - 1`.
 */
export function scaleShift(value: number, n: number): number {
  return Math.abs(value) * n - 1;
}
