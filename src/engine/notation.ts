import { BLACK, EMPTY, WHITE, pointToCoord } from './boardUtil';
import { GridState } from './gridState';

/**
 * Human-readable point and board formatting for logs and test failures.
 * Columns use letters with 'I' skipped, rows are numbered from the top
 * (row 1 is the first row of the padded array).
 */

const COLUMN_LETTERS = 'ABCDEFGHJKLMNOPQRSTUVWXYZ';

export function formatPoint(point: number, size: number): string {
  const coord = pointToCoord(point, size);
  if (!coord) {
    return `border(${point})`;
  }
  return `${COLUMN_LETTERS[coord.col - 1]}${coord.row}`;
}

const CELL_SYMBOLS: Record<number, string> = {
  [EMPTY]: '.',
  [BLACK]: 'X',
  [WHITE]: 'O',
};

/**
 * One line per row, row 1 first; cells separated by a single space.
 */
export function renderBoard(state: GridState): string {
  const cells = state.cellsSnapshot();
  const lines: string[] = [];
  for (let row = 1; row <= state.size; row++) {
    const start = state.rowStart(row);
    const symbols = cells.slice(start, start + state.size).map((cell) => CELL_SYMBOLS[cell] ?? '#');
    lines.push(symbols.join(' '));
  }
  return lines.join('\n');
}
