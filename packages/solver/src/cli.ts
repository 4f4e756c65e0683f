/**
 * Argument parsing and output for the `solve` script.
 *
 * Kept out of `scripts/` so the parsing rules and printed lines can be
 * exercised without spawning a process.
 */

import {
  BoardRowsSchema,
  buildSolverConfig,
  Err,
  Ok,
  QueensError,
  type RandomSource,
  type Result,
  SeededRandom,
  type SolverKind,
  type StartStrategy,
  systemRandom,
  type ValidatedSolverConfig,
} from "@queens/contracts";
import { SOLVER_DEFAULTS } from "./config";
import { Board } from "./core/board";
import { solutionsByBruteForce } from "./solvers/brute-force";
import type { ClimbStep } from "./solvers/hill-climbing";
import { solveWithRestarts } from "./solvers/restarts";
import {
  DEFAULT_CHARSET,
  renderBoard,
  SIMPLE_CHARSET,
} from "./utils/ascii-renderer";

// =============================================================================
// CLI PARSING
// =============================================================================

export interface CliOptions {
  readonly config: ValidatedSolverConfig;
  /** Check this board instead of solving */
  readonly rows?: number[];
  readonly ascii: boolean;
  readonly trace: boolean;
  readonly quiet: boolean;
  readonly color: boolean;
  readonly help: boolean;
}

function isSolverKind(value: string): value is SolverKind {
  return value === "brute-force" || value === "hill-climbing";
}

function isStartStrategy(value: string): value is StartStrategy {
  return value === "random" || value === "permutation";
}

export function parseCliArgs(args: readonly string[]): Result<CliOptions, QueensError> {
  let solver: SolverKind | undefined;
  let size: number | undefined;
  let seed: number | undefined;
  let maxRestarts: number = SOLVER_DEFAULTS.MAX_RESTARTS;
  let start: StartStrategy | undefined;
  let rowsArg: string | undefined;
  let ascii = false;
  let trace = false;
  let quiet = false;
  let color = true;
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    const next = args[i + 1];

    switch (arg) {
      case "--size":
      case "-n": {
        if (next === undefined) return missingValue(arg);
        i++;
        size = Number(next);
        break;
      }
      case "--solver":
      case "-a": {
        if (next === undefined) return missingValue(arg);
        i++;
        if (!isSolverKind(next)) {
          return Err(
            QueensError.configInvalid(
              `Unknown solver "${next}" (expected brute-force or hill-climbing)`,
            ),
          );
        }
        solver = next;
        break;
      }
      case "--seed":
      case "-s": {
        if (next === undefined) return missingValue(arg);
        i++;
        seed = Number(next);
        break;
      }
      case "--restarts":
      case "-r": {
        if (next === undefined) return missingValue(arg);
        i++;
        maxRestarts = Number(next);
        break;
      }
      case "--start": {
        if (next === undefined) return missingValue(arg);
        i++;
        if (!isStartStrategy(next)) {
          return Err(
            QueensError.configInvalid(
              `Unknown start "${next}" (expected random or permutation)`,
            ),
          );
        }
        start = next;
        break;
      }
      case "--rows": {
        if (next === undefined) return missingValue(arg);
        i++;
        rowsArg = next;
        break;
      }
      case "--ascii":
        ascii = true;
        break;
      case "--trace":
      case "-t":
        trace = true;
        break;
      case "--quiet":
      case "-q":
        quiet = true;
        break;
      case "--no-color":
        color = false;
        break;
      case "--help":
      case "-h":
        help = true;
        break;
      default:
        // Bare number as first argument is the board size
        if (i === 0 && /^\d+$/.test(arg)) {
          size = Number(arg);
          break;
        }
        return Err(QueensError.configInvalid(`Unknown option: ${arg}`));
    }
  }

  const config = buildSolverConfig({ solver, size, seed, maxRestarts, start });
  if (!config.success) return Err(config.error);

  let rows: number[] | undefined;
  if (rowsArg !== undefined) {
    const parts = rowsArg.split(",").map((part) => part.trim());
    const blank = parts.indexOf("");
    if (blank !== -1) {
      return Err(
        QueensError.outOfRange(`Missing row for column ${blank}`, { rows: rowsArg }),
      );
    }
    const parsed = BoardRowsSchema.safeParse(parts.map(Number));
    if (!parsed.success) {
      return Err(
        QueensError.outOfRange(
          parsed.error.issues.map((issue) => issue.message).join("; "),
          { rows: rowsArg },
        ),
      );
    }
    rows = parsed.data;
  }

  return Ok({
    config: config.value,
    ...(rows !== undefined && { rows }),
    ascii,
    trace,
    quiet,
    color,
    help,
  });
}

function missingValue(flag: string): Result<CliOptions, QueensError> {
  return Err(QueensError.configInvalid(`Missing value for ${flag}`));
}

export const HELP_TEXT = `
N-Queens Solver

Usage:
  npm run solve -- [options]

Options:
  --size, -n <n>          Board size (default: ${SOLVER_DEFAULTS.DEFAULT_SIZE})
  --solver, -a <name>     brute-force or hill-climbing (default: hill-climbing)
  --seed, -s <n>          Seed for hill climbing (default: random)
  --restarts, -r <n>      Hill-climbing attempts (default: ${SOLVER_DEFAULTS.MAX_RESTARTS})
  --start <kind>          random or permutation starting board (default: random)
  --rows <r0,r1,...>      Check the given board instead of solving
  --ascii                 Draw boards with plain ASCII characters
  --trace, -t             Print every hill-climbing step and restart
  --quiet, -q             Minimal console output
  --no-color              Disable ANSI colors
  --help, -h              Show this help

Examples:
  npm run solve -- --size 8 --seed 12345
  npm run solve -- --solver brute-force --size 6
  npm run solve -- --rows 1,3,0,2
`;

// =============================================================================
// COLORS
// =============================================================================

const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  red: "\x1b[31m",
};

function c(color: keyof typeof colors, text: string, enabled: boolean): string {
  return enabled ? `${colors[color]}${text}${colors.reset}` : text;
}

function formatDuration(ms: number): string {
  if (ms < 1) return `${(ms * 1000).toFixed(0)}µs`;
  if (ms < 1000) return `${ms.toFixed(1)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

// =============================================================================
// RUN
// =============================================================================

export interface CliIO {
  log: (line: string) => void;
  error: (line: string) => void;
}

const consoleIO: CliIO = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

/**
 * Run the CLI and return the process exit code.
 */
export function runCli(args: readonly string[], io: CliIO = consoleIO): number {
  const parsed = parseCliArgs(args);
  if (!parsed.success) {
    io.error(`[Solve] ${parsed.error.message}`);
    return 1;
  }
  return runSolve(parsed.value, io);
}

export function runSolve(options: CliOptions, io: CliIO = consoleIO): number {
  if (options.help) {
    io.log(HELP_TEXT);
    return 0;
  }

  const charset = options.ascii ? SIMPLE_CHARSET : DEFAULT_CHARSET;

  if (options.rows !== undefined) {
    const board = Board.fromRows(options.rows);
    const valid = board.isValid();
    if (!options.quiet) io.log(renderBoard(board, { charset }));
    io.log(`Conflicts: ${board.countConflicts()}`);
    io.log(`Valid: ${valid ? c("green", "yes", options.color) : c("red", "no", options.color)}`);
    return 0;
  }

  const { config } = options;

  if (config.solver === "brute-force") {
    const solutions = solutionsByBruteForce(config.size);
    io.log(
      `Found ${c("cyan", String(solutions.length), options.color)} solution(s) for size ${config.size}`,
    );
    if (!options.quiet) {
      solutions.forEach((board, index) => {
        io.log(`  ${index + 1}. ${board.toString()}`);
      });
    }
    return 0;
  }

  const rng: RandomSource =
    config.seed !== undefined ? new SeededRandom(config.seed) : systemRandom;
  const begin = performance.now();

  const result = solveWithRestarts(config.size, {
    rng,
    start: config.start,
    maxRestarts: config.maxRestarts,
    ...(options.trace && {
      onStep: (step: ClimbStep) =>
        io.log(c("dim", `  step ${step.step}: ${step.conflicts} conflicts`, options.color)),
      onRestart: (attempt: number, error: QueensError) =>
        io.log(c("yellow", `  attempt ${attempt} failed: ${error.message}`, options.color)),
    }),
  });

  if (!result.success) {
    io.error(`[HillClimbing] ${result.error.message}`);
    return 1;
  }

  const { board, attempts } = result.value;
  io.log(
    `${c("green", "✓", options.color)} Solved size ${config.size} in ${attempts} attempt(s) ` +
      `(${formatDuration(performance.now() - begin)})`,
  );
  io.log(board.toString());
  if (!options.quiet) io.log(renderBoard(board, { charset }));
  return 0;
}
