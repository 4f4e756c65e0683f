import { DEFAULT_BOARD_SIZE, DEFAULT_MAX_RESTARTS } from "@queens/contracts";

function envInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export const SOLVER_DEFAULTS = {
  DEFAULT_SIZE: DEFAULT_BOARD_SIZE,
  MAX_RESTARTS: envInt(process.env.QUEENS_MAX_RESTARTS, DEFAULT_MAX_RESTARTS),
  // 11! is ~40M permutations
  BRUTE_FORCE_WARN_SIZE: 10,
} as const;

export const DEV_MODE = process.env.NODE_ENV !== "production";

export type SolverDefaults = typeof SOLVER_DEFAULTS;
