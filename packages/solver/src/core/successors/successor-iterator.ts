/**
 * Lazy enumeration of one-queen moves.
 *
 * The iterator keeps a working copy of the original board and a column
 * cursor. Only the cursor column of the working copy ever differs from the
 * original; a finished column is restored before the cursor moves on.
 */

import type { Board } from "../board/board";

/**
 * Next row to try in a column, or `undefined` when the column is done.
 *
 * Candidates are 0..size-1 ascending with the original row skipped. Columns
 * that were empty in the original produce no candidates.
 */
export function nextCandidateRow(
  current: number | undefined,
  original: number | undefined,
  size: number,
): number | undefined {
  if (original === undefined) return undefined;

  if (current === undefined) {
    return original === 0 ? 1 : 0;
  }

  let next = current + 1;
  if (next === original) next++;
  return next < size ? next : undefined;
}

/**
 * Yields every board that differs from `original` in exactly one occupied
 * column, grouped by column ascending and then by row ascending.
 *
 * A board with `k` occupied columns yields `k * (size - 1)` successors.
 * Empty columns are never filled. The sequence is single-use; build a new
 * iterator from the same board to start over.
 *
 * @example
 * ```typescript
 * const board = Board.fromRows([0, 1]);
 * const moves = [...board.successors()].map((b) => b.toRows());
 * // [[1, 1], [0, 0]]
 * ```
 */
export class SuccessorIterator implements IterableIterator<Board> {
  private readonly original: Board;
  private readonly working: Board;
  private column = 0;
  private exhausted = false;

  constructor(original: Board) {
    this.original = original;
    this.working = original.clone();
    if (original.size !== 0) {
      this.working.clear(0);
    }
  }

  next(): IteratorResult<Board> {
    const size = this.original.size;

    // A 0x0 or 1x1 board has no move that keeps the queen count
    if (size <= 1 || this.exhausted) {
      this.exhausted = true;
      return { done: true, value: undefined };
    }

    while (this.column < size) {
      const current = this.working.getOptional(this.column);
      const original = this.original.getOptional(this.column);
      const candidate = nextCandidateRow(current, original, size);

      if (candidate !== undefined) {
        this.working.set(this.column, candidate);
        return { done: false, value: this.working.clone() };
      }

      this.working.setOptional(this.column, original);
      this.column++;
      if (this.column < size) {
        this.working.clear(this.column);
      }
    }

    this.exhausted = true;
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): SuccessorIterator {
    return this;
  }

  /**
   * True once the cursor has passed the last column
   */
  get done(): boolean {
    return this.exhausted;
  }
}
