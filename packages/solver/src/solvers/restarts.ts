import { Err, Ok, QueensError, type Result } from "@queens/contracts";
import { SOLVER_DEFAULTS } from "../config";
import type { Board } from "../core/board";
import { type HillClimbingOptions, solveByHillClimbing } from "./hill-climbing";

export interface RestartOptions extends HillClimbingOptions {
  /** Total attempts, including the first. Defaults to `SOLVER_DEFAULTS.MAX_RESTARTS`. */
  maxRestarts?: number;
  onRestart?: (attempt: number, error: QueensError) => void;
}

export interface RestartOutcome {
  readonly board: Board;
  readonly attempts: number;
}

/**
 * Run hill climbing from fresh random starts until one reaches zero
 * conflicts or the attempt budget runs out.
 *
 * All attempts draw from the same `rng`, so a seeded source makes the whole
 * run reproducible. Anything other than SOLUTION_NOT_FOUND ends the run
 * immediately.
 */
export function solveWithRestarts(
  size: number,
  options: RestartOptions = {},
): Result<RestartOutcome, QueensError> {
  const maxRestarts = options.maxRestarts ?? SOLVER_DEFAULTS.MAX_RESTARTS;
  if (!Number.isInteger(maxRestarts) || maxRestarts < 1) {
    return Err(
      QueensError.configInvalid(`maxRestarts must be a positive integer, got ${maxRestarts}`, {
        maxRestarts,
      }),
    );
  }

  for (let attempt = 1; attempt <= maxRestarts; attempt++) {
    const result = solveByHillClimbing(size, options);
    if (result.isOk()) {
      return Ok({ board: result.value, attempts: attempt });
    }

    const error = result.error;
    if (error.code !== "SOLUTION_NOT_FOUND") {
      return Err(error);
    }
    options.onRestart?.(attempt, error);
  }

  return Err(
    QueensError.solutionNotFound(
      `No solution found for size ${size} in ${maxRestarts} attempts`,
      { size, attempts: maxRestarts },
    ),
  );
}
