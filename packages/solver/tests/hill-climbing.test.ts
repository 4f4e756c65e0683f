import { type QueensError, SeededRandom } from "@queens/contracts";
import { describe, expect, it } from "vitest";
import { Board, bestSuccessor, type ClimbStep, solveByHillClimbing } from "../src";
import { rowsToDraws, sequenceRng } from "./helpers";

describe("bestSuccessor", () => {
  it("keeps the first minimum in enumeration order", () => {
    // From all-zero rows, moving column 1 to row 3 is the first move down to 3
    const best = bestSuccessor(Board.fromRows([0, 0, 0, 0]));
    expect(best?.conflicts).toBe(3);
    expect(best?.board.toRows()).toEqual([0, 3, 0, 0]);
  });

  it("returns undefined when there are no successors", () => {
    expect(bestSuccessor(Board.fromRows([0]))).toBeUndefined();
  });
});

describe("solveByHillClimbing", () => {
  it("returns a trivial board for sizes 0 and 1", () => {
    const empty = solveByHillClimbing(0);
    expect(empty.success).toBe(true);
    expect(empty.value.size).toBe(0);

    const single = solveByHillClimbing(1);
    expect(single.value.toRows()).toEqual([0]);
  });

  it("reports NO_SOLUTIONS_EXIST for sizes 2 and 3", () => {
    for (let seed = 0; seed < 10; seed++) {
      for (const size of [2, 3]) {
        const result = solveByHillClimbing(size, { rng: new SeededRandom(seed) });
        expect(result.success).toBe(false);
        expect(result.error.code).toBe("NO_SOLUTIONS_EXIST");
      }
    }
  });

  it("rejects invalid sizes", () => {
    expect(solveByHillClimbing(-1).error.code).toBe("CONFIG_INVALID");
    expect(solveByHillClimbing(2.5).error.code).toBe("CONFIG_INVALID");
  });

  it("descends from an all-zero start to a solution", () => {
    const steps: ClimbStep[] = [];
    const result = solveByHillClimbing(4, {
      rng: { next: () => 0 },
      onStep: (step) => steps.push(step),
    });

    expect(result.value.toRows()).toEqual([1, 3, 0, 2]);
    expect(steps.map((s) => [s.step, s.conflicts, s.board.toRows()])).toEqual([
      [1, 3, [0, 3, 0, 0]],
      [2, 1, [1, 3, 0, 0]],
      [3, 0, [1, 3, 0, 2]],
    ]);
  });

  it("stops with SOLUTION_NOT_FOUND when no move strictly improves", () => {
    // A permutation with one diagonal conflict: every move creates a row clash
    const result = solveByHillClimbing(4, {
      rng: sequenceRng(rowsToDraws([1, 3, 2, 0])),
    });

    expect(result.success).toBe(false);
    const error: QueensError = result.error;
    expect(error.code).toBe("SOLUTION_NOT_FOUND");
    expect(error.details).toEqual({
      size: 4,
      conflicts: 1,
      steps: 0,
      rows: [1, 3, 2, 0],
    });
  });

  it("finds valid 8-queens solutions across seeded restarts", () => {
    const rng = new SeededRandom(8);
    const solutions: Board[] = [];

    for (let attempt = 0; attempt < 500 && solutions.length < 3; attempt++) {
      const result = solveByHillClimbing(8, { rng });
      if (result.success) solutions.push(result.value);
    }

    expect(solutions).toHaveLength(3);
    for (const board of solutions) {
      expect(board.isValid()).toBe(true);
      expect(board.countConflicts()).toBe(0);
    }
  });

  it("supports a permutation start", () => {
    const rng = new SeededRandom(21);
    let found: Board | undefined;

    for (let attempt = 0; attempt < 500 && !found; attempt++) {
      const result = solveByHillClimbing(10, { rng, start: "permutation" });
      if (result.success) found = result.value;
    }

    expect(found?.isValid()).toBe(true);
  });

  it("is reproducible with the same seed", () => {
    const outcome = (seed: number) =>
      solveByHillClimbing(12, { rng: new SeededRandom(seed) }).match(
        (board) => board.toString(),
        (error) => `${error.code}:${JSON.stringify(error.details)}`,
      );

    expect(outcome(314)).toBe(outcome(314));
  });
});
