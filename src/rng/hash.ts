/**
 * Deterministic seed hashing
 *
 * String seeds are folded with a multiply-xorshift loop and finished with
 * MurmurHash3's 32-bit finalizer, so the same string maps to the same seed on
 * every platform and JavaScript engine.
 */

/**
 * Hash a string to a 32-bit unsigned integer deterministically.
 *
 * @param str - Input string to hash
 * @returns 32-bit unsigned integer (0 to 4294967295)
 *
 * @example
 * ```ts
 * const seed = hashString("granite");
 * new Perlin(seed).get([0.5, 0.25]); // Always the same value
 * ```
 */
export function hashString(str: string): number {
  let h = 0;

  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    h = Math.imul(h ^ char, 0x5bd1e995);
    h ^= h >>> 15;
  }

  // MurmurHash3 32-bit finalizer
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;

  return h >>> 0;
}

/**
 * Normalize a seed input (string or number) to a 32-bit unsigned integer.
 *
 * - If string: hash to uint32
 * - If number: drop the fraction and the sign, then wrap to uint32
 *
 * @example
 * ```ts
 * normalizeSeed("marble");  // Hashed to uint32
 * normalizeSeed(12345);     // 12345
 * normalizeSeed(-100);      // 100
 * normalizeSeed(2 ** 32);   // 0
 * ```
 */
export function normalizeSeed(seed: string | number): number {
  if (typeof seed === 'string') {
    return hashString(seed);
  }

  return Math.floor(Math.abs(seed)) >>> 0;
}

/**
 * Combine two 32-bit seeds into a new 32-bit seed deterministically.
 *
 * Used to derive fork seeds from a stream seed and a fork label.
 */
export function combineSeed(seed1: number, seed2: number): number {
  let combined = seed1 ^ seed2;
  combined = Math.imul(combined, 0x9e3779b9);
  combined ^= combined >>> 16;
  combined = Math.imul(combined, 0x85ebca6b);
  combined ^= combined >>> 13;

  return combined >>> 0;
}
