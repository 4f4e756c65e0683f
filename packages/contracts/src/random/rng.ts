/**
 * Utility functions for random operations using any number generator
 */

/**
 * A source of uniformly distributed doubles in [0, 1).
 *
 * Every board constructor that needs randomness takes one of these, so tests
 * can pass a `SeededRandom` and get reproducible boards.
 */
export interface RandomSource {
  next(): number;
}

/**
 * Random integer between min and max (inclusive)
 * @param rng - Random number generator function (returns 0 to 1)
 */
export function range(rng: () => number, min: number, max: number): number {
  return ~~(rng() * (max - min + 1)) + min;
}

/**
 * Random integer in [0, bound). `bound` must be positive.
 */
export function below(rng: () => number, bound: number): number {
  return range(rng, 0, bound - 1);
}

/**
 * Fisher-Yates array shuffle
 * @param rng - Random number generator function (returns 0 to 1)
 * @returns A new shuffled array
 */
export function shuffle<T>(rng: () => number, array: readonly T[]): T[] {
  const result: T[] = Array.from(array);
  for (let i = result.length - 1; i > 0; i--) {
    const j = range(rng, 0, i);
    const temp = result[i] as T;
    result[i] = result[j] as T;
    result[j] = temp;
  }
  return result;
}
