import { BoardConstraintViolation, EngineErrorCode, RulesViolation } from './errors';

/**
 * Cell values of the padded grid.
 *
 * The board is a one-dimensional array with a one-cell BORDER frame. Row `r`
 * (1-based) starts at `r * (size + 1) + 1`; the trailing cell of each row
 * doubles as the leading border cell of the next, so a row-to-row step is
 * `size + 1`. An extra BORDER row above and below, plus one trailing cell,
 * keep every neighbor and diagonal lookup from an interior point in range.
 */
export const EMPTY = 0;
export const BLACK = 1;
export const WHITE = 2;
export const BORDER = 3;

export type StoneColor = typeof BLACK | typeof WHITE;
export type CellState = typeof EMPTY | StoneColor | typeof BORDER;

export const STONE_COLORS: readonly StoneColor[] = [BLACK, WHITE];

export const MIN_BOARD_SIZE = 2;
export const MAX_BOARD_SIZE = 25;

/** Number of consecutive stones that wins the game. */
export const WIN_LENGTH = 5;

export interface Coordinate {
  row: number;
  col: number;
}

export function isBlackWhite(value: unknown): value is StoneColor {
  return value === BLACK || value === WHITE;
}

export function colorName(color: CellState): 'empty' | 'black' | 'white' | 'border' {
  switch (color) {
    case EMPTY:
      return 'empty';
    case BLACK:
      return 'black';
    case WHITE:
      return 'white';
    case BORDER:
      return 'border';
  }
}

export function assertStoneColor(color: unknown, domain: string = 'Rules'): asserts color is StoneColor {
  if (!isBlackWhite(color)) {
    throw new RulesViolation(
      EngineErrorCode.RULES_INVALID_COLOR,
      'Color must be BLACK or WHITE',
      { color },
      domain
    );
  }
}

export function opponent(color: StoneColor): StoneColor {
  return color === BLACK ? WHITE : BLACK;
}

export function assertBoardSize(size: number): void {
  if (!Number.isInteger(size) || size < MIN_BOARD_SIZE || size > MAX_BOARD_SIZE) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_INVALID_SIZE,
      `Board size must be an integer between ${MIN_BOARD_SIZE} and ${MAX_BOARD_SIZE}`,
      { size }
    );
  }
}

/** Length of the padded cell array for a board of `size`. */
export function maxPointFor(size: number): number {
  return size * size + 3 * (size + 1);
}

/**
 * Map a 1-based (row, col) pair to its index in the padded array.
 */
export function coordToPoint(row: number, col: number, size: number): number {
  if (
    !Number.isInteger(row) ||
    !Number.isInteger(col) ||
    row < 1 ||
    row > size ||
    col < 1 ||
    col > size
  ) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_INVALID_COORDINATE,
      `Coordinate (${row}, ${col}) is outside a ${size}x${size} board`,
      { row, col, size }
    );
  }
  return row * (size + 1) + col;
}

/**
 * Inverse of {@link coordToPoint}. Returns null for border points.
 */
export function pointToCoord(point: number, size: number): Coordinate | null {
  const stride = size + 1;
  const row = Math.floor(point / stride);
  const col = point % stride;
  if (row < 1 || row > size || col < 1 || col > size) {
    return null;
  }
  return { row, col };
}

/**
 * Indices of the cells that satisfy `predicate`, ascending.
 */
export function pointsWhere(
  cells: readonly CellState[],
  predicate: (cell: CellState) => boolean
): number[] {
  const points: number[] = [];
  cells.forEach((cell, index) => {
    if (predicate(cell)) {
      points.push(index);
    }
  });
  return points;
}
