/**
 * Randomness capability injected into the route generator.
 *
 * Production code uses {@link SeededRandom}; tests substitute scripted
 * sequences to force specific candidate picks.
 */
export interface RandomSource {
  /** Next value in [0, 1) */
  next(): number;
  /** Integer in [min, max] */
  range(min: number, max: number): number;
  /** Uniform pick, `undefined` for an empty array */
  choice<T>(array: readonly [T, ...T[]]): T;
  choice<T>(array: readonly T[]): T | undefined;
  /** True with the given probability */
  probability(chance: number): boolean;
}
