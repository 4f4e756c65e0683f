/**
 * Source of every ordering of [0, size), each exactly once.
 */
export type PermutationSource = (size: number) => Iterable<readonly number[]>;

function swap(array: number[], i: number, j: number): void {
  const temp = array[i] as number;
  array[i] = array[j] as number;
  array[j] = temp;
}

/**
 * Heap's algorithm, iterative form. Each yielded array is a fresh copy.
 *
 * Consecutive permutations differ by a single swap; size 0 yields one empty
 * permutation.
 */
export function* heapPermutations(size: number): Generator<number[]> {
  const current = Array.from({ length: size }, (_, i) => i);
  const counters = new Array<number>(size).fill(0);

  yield [...current];

  let i = 1;
  while (i < size) {
    const counter = counters[i] ?? 0;
    if (counter < i) {
      swap(current, i % 2 === 0 ? 0 : counter, i);
      yield [...current];
      counters[i] = counter + 1;
      i = 1;
    } else {
      counters[i] = 0;
      i++;
    }
  }
}
