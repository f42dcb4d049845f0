import {
  BLACK,
  StoneColor,
  WHITE,
  coordToPoint,
} from '../../src/engine/boardUtil';
import { GridState } from '../../src/engine/gridState';

/**
 * Build a grid from text rows: 'X' black, 'O' white, '.' empty, whitespace
 * ignored. Stones are written through the raw write path, so positions the
 * placement engine would reject (for example a second winning run) are
 * allowed.
 */
export function gridFromRows(rows: string[]): GridState {
  const size = rows.length;
  const state = new GridState(size);
  rows.forEach((line, r) => {
    const symbols = line.replace(/\s+/g, '');
    if (symbols.length !== size) {
      throw new Error(`Row ${r + 1} has ${symbols.length} cells, expected ${size}`);
    }
    [...symbols].forEach((symbol, c) => {
      const point = coordToPoint(r + 1, c + 1, size);
      if (symbol === 'X') state.placeStone(point, BLACK);
      else if (symbol === 'O') state.placeStone(point, WHITE);
    });
  });
  return state;
}

/** Shorthand for a 1-based (row, col) point on a board of `size`. */
export function pt(size: number, row: number, col: number): number {
  return coordToPoint(row, col, size);
}

/**
 * Points of a straight line of `length` starting at (row, col) and stepping
 * by (dRow, dCol).
 */
export function linePoints(
  size: number,
  row: number,
  col: number,
  dRow: number,
  dCol: number,
  length: number
): number[] {
  return Array.from({ length }, (_, i) => coordToPoint(row + i * dRow, col + i * dCol, size));
}

export function placeAll(state: GridState, points: number[], color: StoneColor): void {
  for (const point of points) {
    state.placeStone(point, color);
  }
}

/**
 * Color for a full-board pattern that alternates along every row and never
 * lines up five of a kind in any direction.
 */
export function drawPatternColor(row: number, col: number): StoneColor {
  return (col + Math.floor(row / 2)) % 2 === 0 ? BLACK : WHITE;
}
