/**
 * ASCII Board Renderer
 *
 * Renders boards as text for the CLI and for debugging.
 *
 * @example
 * ```typescript
 * import { Board, renderBoard, SIMPLE_CHARSET } from "@queens/solver";
 *
 * console.log(renderBoard(Board.fromRows([1, 3, 0, 2]), { charset: SIMPLE_CHARSET }));
 * // . . Q .
 * // Q . . .
 * // . . . Q
 * // . Q . .
 * ```
 */

import type { Board } from "../core/board";

export interface AsciiCharset {
  readonly queen: string;
  readonly empty: string;
}

export const DEFAULT_CHARSET: AsciiCharset = {
  queen: "♛",
  empty: "·",
};

/**
 * Simple ASCII charset (for terminals without unicode support)
 */
export const SIMPLE_CHARSET: AsciiCharset = {
  queen: "Q",
  empty: ".",
};

export interface RenderOptions {
  readonly charset?: AsciiCharset;
}

/**
 * Row 0 is the top line; each line has one cell per column.
 */
export function renderBoard(board: Board, options: RenderOptions = {}): string {
  const charset = options.charset ?? DEFAULT_CHARSET;
  const rows = board.toRows();
  const lines: string[] = [];

  for (let row = 0; row < board.size; row++) {
    lines.push(
      rows.map((queenRow) => (queenRow === row ? charset.queen : charset.empty)).join(" "),
    );
  }

  return lines.join("\n");
}

export function printBoard(board: Board, options: RenderOptions = {}): void {
  console.log(renderBoard(board, options));
}
