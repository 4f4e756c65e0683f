/**
 * Steepest-descent hill climbing over the successor graph.
 *
 * Each step evaluates every one-queen move and adopts the one with the
 * fewest conflicts. The search stops at zero conflicts, or as soon as the
 * best move is not a strict improvement (local minimum or plateau). Retrying
 * from a fresh start is the caller's job; see `solveWithRestarts`.
 */

import {
  BoardSizeSchema,
  Err,
  Ok,
  QueensError,
  type RandomSource,
  type Result,
  type StartStrategy,
  systemRandom,
} from "@queens/contracts";
import { Board } from "../core/board";

export interface ClimbStep {
  /** 1-based index of the adopted move */
  readonly step: number;
  readonly conflicts: number;
  readonly board: Board;
}

export interface HillClimbingOptions {
  rng?: RandomSource;
  /** Defaults to `"random"` (independent row per column) */
  start?: StartStrategy;
  onStep?: (step: ClimbStep) => void;
}

export interface ScoredBoard {
  readonly board: Board;
  readonly conflicts: number;
}

function createStart(size: number, rng: RandomSource, start: StartStrategy): Board {
  return start === "permutation"
    ? Board.randomPermutation(size, rng)
    : Board.random(size, rng);
}

/**
 * Lowest-conflict successor of `board`. Ties go to the first one in
 * enumeration order (lowest column, then lowest row).
 */
export function bestSuccessor(board: Board): ScoredBoard | undefined {
  let best: ScoredBoard | undefined;
  for (const candidate of board.successors()) {
    const conflicts = candidate.countConflicts();
    if (best === undefined || conflicts < best.conflicts) {
      best = { board: candidate, conflicts };
    }
  }
  return best;
}

export function solveByHillClimbing(
  size: number,
  options: HillClimbingOptions = {},
): Result<Board, QueensError> {
  const parsed = BoardSizeSchema.safeParse(size);
  if (!parsed.success) {
    return Err(
      QueensError.configInvalid(
        parsed.error.issues.map((issue) => issue.message).join("; "),
        { size },
      ),
    );
  }

  const rng = options.rng ?? systemRandom;
  const start = options.start ?? "random";

  // Zero or one queen cannot conflict
  if (size < 2) {
    return Ok(createStart(size, rng, start));
  }

  if (size === 2 || size === 3) {
    return Err(QueensError.noSolutionsExist(size));
  }

  let current = createStart(size, rng, start);
  let conflicts = current.countConflicts();
  let steps = 0;

  while (conflicts !== 0) {
    const best = bestSuccessor(current);

    // Strict improvement only: sideways moves could cycle on a plateau
    if (best === undefined || best.conflicts >= conflicts) {
      return Err(
        QueensError.solutionNotFound(
          `Hill climbing stopped at ${conflicts} conflicts after ${steps} steps`,
          { size, conflicts, steps, rows: current.toRows() },
        ),
      );
    }

    current = best.board;
    conflicts = best.conflicts;
    steps++;
    options.onStep?.({ step: steps, conflicts, board: current });
  }

  return Ok(current);
}
