import { z } from "zod";
import { MAX_BOARD_SIZE } from "../constants";

export const BoardSizeSchema = z
  .number()
  .int("Board size must be an integer")
  .min(0, "Board size must be non-negative")
  .max(MAX_BOARD_SIZE, `Board size cannot exceed ${MAX_BOARD_SIZE}`);

/**
 * Row assignment for a full board: entry `i` is the row of the queen in
 * column `i`, and every row must fit the board implied by the array length.
 */
export const BoardRowsSchema = z
  .array(z.number().int("Rows must be integers").min(0, "Rows must be non-negative"))
  .max(MAX_BOARD_SIZE, `Board size cannot exceed ${MAX_BOARD_SIZE}`)
  .superRefine((rows, ctx) => {
    rows.forEach((row, column) => {
      if (row >= rows.length) {
        ctx.addIssue({
          code: "custom",
          message: `Row ${row} in column ${column} is out of range for a board of size ${rows.length}`,
          path: [column],
        });
      }
    });
  });
