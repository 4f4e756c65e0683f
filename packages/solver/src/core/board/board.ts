/**
 * N-Queens board: one optional queen per column.
 * Uses flat Int32Array storage with -1 marking an empty column.
 */

import {
  below,
  MAX_BOARD_SIZE,
  QueensError,
  type RandomSource,
  shuffle,
  systemRandom,
} from "@queens/contracts";
import { SuccessorIterator } from "../successors/successor-iterator";
import { attacks } from "./conflicts";

const EMPTY = -1;

function assertSize(size: number): void {
  if (!Number.isInteger(size) || size < 0 || size > MAX_BOARD_SIZE) {
    throw QueensError.outOfRange(
      `Invalid board size: ${size} (expected an integer in [0, ${MAX_BOARD_SIZE}])`,
      { size },
    );
  }
}

/**
 * Queen placement on a square board, indexed by column.
 *
 * "One queen per column" is structural. Whether queens share a row or a
 * diagonal is a validity question answered by `isValid()` and
 * `countConflicts()`.
 *
 * @remarks
 * Boards are mutable. Anything that needs to branch (the successor iterator,
 * the solvers) works on `clone()`s, which never share storage.
 */
export class Board {
  readonly size: number;
  private readonly queens: Int32Array;

  private constructor(size: number, queens: Int32Array) {
    this.size = size;
    this.queens = queens;
  }

  /**
   * Create a board with every column empty
   */
  static empty(size: number): Board {
    assertSize(size);
    return new Board(size, new Int32Array(size).fill(EMPTY));
  }

  /**
   * Create a full board where each column's row is drawn independently.
   * Rows may repeat.
   */
  static random(size: number, rng: RandomSource = systemRandom): Board {
    const board = Board.empty(size);
    for (let column = 0; column < size; column++) {
      board.setRandom(column, rng);
    }
    return board;
  }

  /**
   * Create a full board whose rows are a random permutation of [0, size),
   * so only diagonal conflicts remain.
   */
  static randomPermutation(size: number, rng: RandomSource = systemRandom): Board {
    assertSize(size);
    const rows = Array.from({ length: size }, (_, i) => i);
    return Board.fromRows(shuffle(() => rng.next(), rows));
  }

  /**
   * Create a full board from row indices; `rows[i]` is the row in column i.
   *
   * @throws {QueensError} OUT_OF_RANGE if a row is not an integer in [0, rows.length)
   */
  static fromRows(rows: readonly number[]): Board {
    const board = Board.empty(rows.length);
    rows.forEach((row, column) => board.set(column, row));
    return board;
  }

  // ===========================================================================
  // BOUNDS CHECKING
  // ===========================================================================

  private isInBounds(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.size;
  }

  private assertColumn(column: number): void {
    if (!this.isInBounds(column)) {
      throw QueensError.outOfRange(
        `Column ${column} is outside a board of size ${this.size}`,
        { column, size: this.size },
      );
    }
  }

  private rowAt(column: number): number {
    return this.queens[column] ?? EMPTY;
  }

  // ===========================================================================
  // CELL ACCESS
  // ===========================================================================

  isOccupied(column: number): boolean {
    this.assertColumn(column);
    return this.rowAt(column) !== EMPTY;
  }

  /**
   * Row of the queen in `column`.
   *
   * @throws {QueensError} UNOCCUPIED if the column is empty
   */
  get(column: number): number {
    this.assertColumn(column);
    const row = this.rowAt(column);
    if (row === EMPTY) {
      throw QueensError.unoccupied(column);
    }
    return row;
  }

  getOptional(column: number): number | undefined {
    this.assertColumn(column);
    const row = this.rowAt(column);
    return row === EMPTY ? undefined : row;
  }

  set(column: number, row: number): void {
    this.assertColumn(column);
    if (!this.isInBounds(row)) {
      throw QueensError.outOfRange(
        `Row ${row} is outside a board of size ${this.size}`,
        { column, row, size: this.size },
      );
    }
    this.queens[column] = row;
  }

  /**
   * Set or clear a column in one call (`undefined` clears)
   */
  setOptional(column: number, row: number | undefined): void {
    if (row === undefined) {
      this.clear(column);
    } else {
      this.set(column, row);
    }
  }

  clear(column: number): void {
    this.assertColumn(column);
    this.queens[column] = EMPTY;
  }

  /**
   * Move the queen in `column` to a uniformly random row
   */
  setRandom(column: number, rng: RandomSource = systemRandom): void {
    this.assertColumn(column);
    this.queens[column] = below(() => rng.next(), this.size);
  }

  // ===========================================================================
  // VALIDITY
  // ===========================================================================

  /**
   * True when every column holds a queen and no two queens share a row or a
   * diagonal. Checks run in that order and stop at the first failure.
   */
  isValid(): boolean {
    const n = this.size;

    for (let column = 0; column < n; column++) {
      if (this.rowAt(column) === EMPTY) return false;
    }

    for (let i = 0; i < n; i++) {
      const ri = this.rowAt(i);
      for (let j = i + 1; j < n; j++) {
        if (ri === this.rowAt(j)) return false;
      }
    }

    for (let i = 0; i < n; i++) {
      const ri = this.rowAt(i);
      for (let j = i + 1; j < n; j++) {
        const rj = this.rowAt(j);
        if (i + ri === j + rj || i - ri === j - rj) return false;
      }
    }

    return true;
  }

  /**
   * Number of unordered pairs of queens that attack each other.
   * Empty columns are ignored, so this works on partial boards.
   */
  countConflicts(): number {
    const n = this.size;
    let conflicts = 0;

    for (let i = 0; i < n; i++) {
      const ri = this.rowAt(i);
      if (ri === EMPTY) continue;
      for (let j = i + 1; j < n; j++) {
        const rj = this.rowAt(j);
        if (rj === EMPTY) continue;
        if (attacks(i, ri, j, rj)) conflicts++;
      }
    }

    return conflicts;
  }

  // ===========================================================================
  // DERIVED BOARDS
  // ===========================================================================

  clone(): Board {
    return new Board(this.size, this.queens.slice());
  }

  /**
   * Every board reachable by moving one existing queen within its column
   */
  successors(): SuccessorIterator {
    return new SuccessorIterator(this);
  }

  // ===========================================================================
  // CONVERSION
  // ===========================================================================

  toRows(): (number | null)[] {
    return Array.from(this.queens, (row) => (row === EMPTY ? null : row));
  }

  equals(other: Board): boolean {
    if (other.size !== this.size) return false;
    for (let column = 0; column < this.size; column++) {
      if (this.rowAt(column) !== other.rowAt(column)) return false;
    }
    return true;
  }

  toString(): string {
    return `[${this.toRows()
      .map((row) => (row === null ? "-" : String(row)))
      .join(", ")}]`;
  }
}
