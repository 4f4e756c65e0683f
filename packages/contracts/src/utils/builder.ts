import {
  SolverConfigSchema,
  type ValidatedSolverConfig,
} from "../schemas/solver";
import { QueensError } from "../types/error";
import { Err, Ok, type Result } from "../types/result";
import type { SolverKind, StartStrategy } from "../types/solver";

export const DEFAULT_BOARD_SIZE = 8;
export const DEFAULT_MAX_RESTARTS = 100;

export type BuildConfigInput = {
  solver?: SolverKind;
  size?: number;
  seed?: number;
  maxRestarts?: number;
  start?: StartStrategy;
};

/**
 * Fill in defaults and validate a solver configuration.
 *
 * Hill-climbing only fields are dropped for the brute-force solver.
 */
export function buildSolverConfig(
  input: BuildConfigInput,
): Result<ValidatedSolverConfig, QueensError> {
  const solver = input.solver ?? "hill-climbing";
  const size = input.size ?? DEFAULT_BOARD_SIZE;

  const candidate =
    solver === "brute-force"
      ? { solver, size }
      : {
          solver,
          size,
          ...(input.seed !== undefined && { seed: input.seed }),
          maxRestarts: input.maxRestarts ?? DEFAULT_MAX_RESTARTS,
          start: input.start ?? "random",
        };

  const parsed = SolverConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    return Err(
      QueensError.configInvalid(
        parsed.error.issues.map((issue) => issue.message).join("; "),
        { issues: parsed.error.issues },
      ),
    );
  }
  return Ok(parsed.data);
}
