/**
 * Error codes for board and solver operations.
 *
 * - `OUT_OF_RANGE` / `UNOCCUPIED` are contract violations and are thrown.
 * - `NO_SOLUTIONS_EXIST` / `SOLUTION_NOT_FOUND` are search outcomes and are
 *   returned inside a `Result`.
 * - `CONFIG_INVALID` comes from configuration validation.
 */
export type QueensErrorCode =
  | "OUT_OF_RANGE"
  | "UNOCCUPIED"
  | "NO_SOLUTIONS_EXIST"
  | "SOLUTION_NOT_FOUND"
  | "CONFIG_INVALID";

/**
 * Unified error type for every board and solver operation.
 *
 * @example
 * ```typescript
 * const error = QueensError.outOfRange("Row 8 is outside an 8x8 board", {
 *   column: 2,
 *   row: 8,
 * });
 * ```
 */
export class QueensError extends Error {
  readonly name = "QueensError";

  constructor(
    public readonly code: QueensErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, QueensError);
    }
  }

  static outOfRange(message: string, details?: Record<string, unknown>): QueensError {
    return new QueensError("OUT_OF_RANGE", message, details);
  }

  static unoccupied(column: number): QueensError {
    return new QueensError("UNOCCUPIED", `Column ${column} has no queen`, {
      column,
    });
  }

  static noSolutionsExist(size: number): QueensError {
    return new QueensError(
      "NO_SOLUTIONS_EXIST",
      `No solutions exist for a board of size ${size}`,
      { size },
    );
  }

  static solutionNotFound(message: string, details?: Record<string, unknown>): QueensError {
    return new QueensError("SOLUTION_NOT_FOUND", message, details);
  }

  static configInvalid(message: string, details?: Record<string, unknown>): QueensError {
    return new QueensError("CONFIG_INVALID", message, details);
  }

  /**
   * Check if an unknown error is a QueensError.
   */
  static isQueensError(error: unknown): error is QueensError {
    return error instanceof QueensError;
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): {
    name: string;
    code: QueensErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
