import type { RandomSource } from "@queens/contracts";

/**
 * Random source that replays `values` in a loop.
 */
export function sequenceRng(values: readonly number[]): RandomSource {
  let index = 0;
  return {
    next: () => {
      const value = values[index % values.length] ?? 0;
      index++;
      return value;
    },
  };
}

/**
 * Values that make `Board.random(rows.length, rng)` produce exactly `rows`.
 */
export function rowsToDraws(rows: readonly number[]): number[] {
  return rows.map((row) => (row + 0.5) / rows.length);
}
