/**
 * N-Queens solver package
 *
 * Board model with conflict counting, lazy one-queen successor enumeration,
 * hill climbing with restarts, and exhaustive brute force for small boards.
 *
 * @example
 * ```typescript
 * import { SeededRandom } from "@queens/contracts";
 * import { printBoard, solveWithRestarts } from "@queens/solver";
 *
 * const result = solveWithRestarts(8, { rng: new SeededRandom(12345) });
 *
 * if (result.success) {
 *   console.log(`Solved after ${result.value.attempts} attempt(s)`);
 *   printBoard(result.value.board);
 * }
 * ```
 */

export { DEV_MODE, SOLVER_DEFAULTS, type SolverDefaults } from "./config";
export * from "./core";
export * from "./solvers";
export * from "./utils";
export * from "./cli";
