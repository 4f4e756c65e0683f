/**
 * Largest board the toolkit accepts. Boards are stored in Int32Array slots
 * and the pairwise conflict count is O(n^2), so this is a practical bound,
 * not a representational one.
 */
export const MAX_BOARD_SIZE = 4096;

/**
 * Exhaustive enumeration walks n! permutations; beyond this the brute-force
 * solver is rejected by configuration validation.
 */
export const MAX_BRUTE_FORCE_SIZE = 12;
