import { PermutationTable } from '../permutationTable';

/**
 * Base for generators driven by a permutation table. Subclasses provide
 * `withSeed` so reseeding returns their own type.
 */
export abstract class SeededGenerator {
  protected readonly perm: PermutationTable;
  protected readonly seed: number;

  constructor(seed: number) {
    this.seed = seed >>> 0;
    this.perm = new PermutationTable(this.seed);
  }

  getSeed(): number {
    return this.seed;
  }
}
