import { z } from "zod";
import { MAX_BRUTE_FORCE_SIZE } from "../constants";
import { BoardSizeSchema } from "./board";

const BruteForceSchema = z.object({
  solver: z.literal("brute-force"),
  size: BoardSizeSchema.max(
    MAX_BRUTE_FORCE_SIZE,
    `Brute force is limited to boards of size ${MAX_BRUTE_FORCE_SIZE} or less`,
  ),
});

const HillClimbingSchema = z.object({
  solver: z.literal("hill-climbing"),
  size: BoardSizeSchema,
  seed: z
    .number()
    .int("Seed must be an integer")
    .min(0, "Seed must be non-negative")
    .max(0xffffffff, "Seed must fit in uint32")
    .optional(),
  maxRestarts: z.number().int().min(1, "At least one attempt is required"),
  start: z.enum(["random", "permutation"]),
});

export const SolverConfigSchema = z.discriminatedUnion("solver", [
  BruteForceSchema,
  HillClimbingSchema,
]);

export type ValidatedSolverConfig = z.infer<typeof SolverConfigSchema>;
