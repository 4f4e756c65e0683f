import { describe, expect, it } from "vitest";
import {
  Board,
  type CliIO,
  HELP_TEXT,
  parseCliArgs,
  runCli,
  SOLVER_DEFAULTS,
} from "../src";

function capture(): CliIO & { lines: string[]; errors: string[] } {
  const lines: string[] = [];
  const errors: string[] = [];
  return {
    lines,
    errors,
    log: (line) => lines.push(line),
    error: (line) => errors.push(line),
  };
}

describe("parseCliArgs", () => {
  it("applies defaults", () => {
    const res = parseCliArgs([]);
    if (!res.success) throw new Error("unexpected error");
    expect(res.value.config).toEqual({
      solver: "hill-climbing",
      size: 8,
      maxRestarts: SOLVER_DEFAULTS.MAX_RESTARTS,
      start: "random",
    });
    expect(res.value.color).toBe(true);
    expect(res.value.rows).toBeUndefined();
  });

  it("reads solver options", () => {
    const res = parseCliArgs(["--solver", "brute-force", "-n", "6", "--quiet"]);
    if (!res.success) throw new Error("unexpected error");
    expect(res.value.config).toEqual({ solver: "brute-force", size: 6 });
    expect(res.value.quiet).toBe(true);
  });

  it("accepts a bare size as the first argument", () => {
    const res = parseCliArgs(["12", "--seed", "5", "--start", "permutation"]);
    if (!res.success) throw new Error("unexpected error");
    expect(res.value.config).toEqual({
      solver: "hill-climbing",
      size: 12,
      seed: 5,
      maxRestarts: SOLVER_DEFAULTS.MAX_RESTARTS,
      start: "permutation",
    });
  });

  it("reports missing values and unknown options", () => {
    expect(parseCliArgs(["--size"]).error.message).toBe("Missing value for --size");
    expect(parseCliArgs(["--bogus"]).error.message).toBe("Unknown option: --bogus");
    expect(parseCliArgs(["--solver", "dfs"]).error.message).toBe(
      'Unknown solver "dfs" (expected brute-force or hill-climbing)',
    );
  });

  it("rejects rows that do not fit the board", () => {
    const res = parseCliArgs(["--rows", "1,2,3,4,5"]);
    expect(res.error.code).toBe("OUT_OF_RANGE");
    expect(res.error.message).toBe("Row 5 in column 4 is out of range for a board of size 5");
  });

  it("rejects blank row entries", () => {
    const gap = parseCliArgs(["--rows", "1,,0"]);
    expect(gap.error.code).toBe("OUT_OF_RANGE");
    expect(gap.error.message).toBe("Missing row for column 1");

    const empty = parseCliArgs(["--rows", ""]);
    expect(empty.error.code).toBe("OUT_OF_RANGE");
    expect(empty.error.message).toBe("Missing row for column 0");
  });

  it("rejects a size that fails validation", () => {
    expect(parseCliArgs(["--size", "abc"]).error.code).toBe("CONFIG_INVALID");
  });
});

describe("runCli", () => {
  it("prints help", () => {
    const io = capture();
    expect(runCli(["--help"], io)).toBe(0);
    expect(io.lines).toEqual([HELP_TEXT]);
  });

  it("checks a given board", () => {
    const io = capture();
    expect(runCli(["--rows", "1,3,0,2", "--ascii", "--no-color"], io)).toBe(0);
    expect(io.lines).toEqual([
      ". . Q .\nQ . . .\n. . . Q\n. Q . .",
      "Conflicts: 0",
      "Valid: yes",
    ]);
  });

  it("reports conflicts on an invalid board", () => {
    const io = capture();
    runCli(["--rows", "0,0", "--quiet", "--no-color"], io);
    expect(io.lines).toEqual(["Conflicts: 1", "Valid: no"]);
  });

  it("lists brute-force solutions", () => {
    const io = capture();
    expect(runCli(["--solver", "brute-force", "--size", "4", "--no-color"], io)).toBe(0);
    expect(io.lines[0]).toBe("Found 2 solution(s) for size 4");
    expect(io.lines).toHaveLength(3);
    expect(io.lines.slice(1).map((line) => line.slice(5)).sort()).toEqual([
      "[1, 3, 0, 2]",
      "[2, 0, 3, 1]",
    ]);
  });

  it("fails for boards without solutions", () => {
    const io = capture();
    expect(runCli(["--size", "3", "--no-color"], io)).toBe(1);
    expect(io.errors).toEqual(["[HillClimbing] No solutions exist for a board of size 3"]);
  });

  it("fails with a usage error", () => {
    const io = capture();
    expect(runCli(["--restarts", "0"], io)).toBe(1);
    expect(io.errors).toEqual(["[Solve] At least one attempt is required"]);
  });

  it("solves a seeded board", () => {
    const io = capture();
    expect(runCli(["--size", "8", "--seed", "7", "--quiet", "--no-color"], io)).toBe(0);
    expect(io.lines).toHaveLength(2);
    expect(io.lines[0]).toMatch(/^✓ Solved size 8 in \d+ attempt\(s\) \(/);

    const rows = (io.lines[1] ?? "").slice(1, -1).split(", ").map(Number);
    expect(Board.fromRows(rows).isValid()).toBe(true);
  });

  it("prints steps with --trace", () => {
    const io = capture();
    expect(runCli(["--size", "4", "--seed", "1", "--trace", "--no-color", "--quiet"], io)).toBe(0);
    expect(io.lines.slice(0, 6)).toEqual([
      "  step 1: 2 conflicts",
      "  step 2: 1 conflicts",
      "  attempt 1 failed: Hill climbing stopped at 1 conflicts after 2 steps",
      "  step 1: 2 conflicts",
      "  step 2: 1 conflicts",
      "  step 3: 0 conflicts",
    ]);
    expect(io.lines[6]).toMatch(/^✓ Solved size 4 in 2 attempt\(s\) \(/);
    expect(io.lines[7]).toBe("[1, 3, 0, 2]");
    expect(io.lines).toHaveLength(8);
  });
});
