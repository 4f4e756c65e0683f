/**
 * How hill climbing builds its starting board.
 *
 * - `random`: every column gets an independent uniformly random row
 * - `permutation`: rows are a random permutation, so no two queens share a row
 */
export type StartStrategy = "random" | "permutation";

export type SolverKind = "brute-force" | "hill-climbing";

