/**
 * Closed-form attack test for two queens in different columns.
 *
 * Cells on a rising diagonal share `column - row`, cells on a falling
 * diagonal share `column + row`. Columns are distinct by construction, so
 * only rows and the two diagonals need checking.
 */
export function attacks(
  columnA: number,
  rowA: number,
  columnB: number,
  rowB: number,
): boolean {
  return (
    rowA === rowB ||
    columnA + rowA === columnB + rowB ||
    columnA - rowA === columnB - rowB
  );
}

