import { QueensError } from "@queens/contracts";
import { DEV_MODE, SOLVER_DEFAULTS } from "../config";
import { Board } from "../core/board";
import {
  heapPermutations,
  type PermutationSource,
} from "../core/permutations";

/**
 * Every solution for a board of `size`, found by checking each permutation
 * of rows for validity.
 *
 * A permutation never repeats a row, so only diagonals are left for
 * `isValid()` to reject. Work grows as size!, so keep this to small boards.
 * Result order follows the permutation source and carries no meaning.
 *
 * @throws {QueensError} OUT_OF_RANGE for a size that is not a non-negative integer
 */
export function solutionsByBruteForce(
  size: number,
  permutations: PermutationSource = heapPermutations,
): Board[] {
  if (!Number.isInteger(size) || size < 0) {
    throw QueensError.outOfRange(`Invalid board size: ${size}`, { size });
  }

  if (DEV_MODE && size > SOLVER_DEFAULTS.BRUTE_FORCE_WARN_SIZE) {
    console.warn(
      `[BruteForce] size ${size} enumerates ${size}! permutations; expect a long run`,
    );
  }

  const solutions: Board[] = [];
  for (const rows of permutations(size)) {
    const board = Board.fromRows(rows);
    if (board.isValid()) {
      solutions.push(board);
    }
  }
  return solutions;
}
