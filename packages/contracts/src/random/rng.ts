/**
 * Random helpers that work on any `() => number` source returning [0, 1).
 */

/**
 * Random integer between min and max (inclusive)
 */
export function range(rng: () => number, min: number, max: number): number {
  return ~~(rng() * (max - min + 1)) + min;
}

/**
 * Uniform pick from an array
 * @returns `undefined` for an empty array
 */
export function choice<T>(rng: () => number, array: readonly [T, ...T[]]): T;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined {
  if (array.length === 0) return undefined;
  return array[range(rng, 0, array.length - 1)];
}

/**
 * Boolean with given probability
 * @param chance - probability (0 to 1) of returning true
 */
export function probability(rng: () => number, chance: number): boolean {
  return rng() < chance;
}
