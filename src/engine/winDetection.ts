import { BLACK, StoneColor, WHITE, WIN_LENGTH, assertStoneColor } from './boardUtil';
import { GridState } from './gridState';

export type GameStatus = 'ongoing' | 'black_wins' | 'white_wins' | 'board_full_no_winner';

export type ScanDirection = 'horizontal' | 'vertical' | 'diagonal_down_right' | 'diagonal_down_left';

export interface WinningRun {
  color: StoneColor;
  direction: ScanDirection;
  /** WIN_LENGTH points, starting at the first stone found, ascending. */
  points: number[];
}

/** Scan order is fixed; the first direction holding a run decides the result. */
export const SCAN_DIRECTIONS: readonly ScanDirection[] = [
  'horizontal',
  'vertical',
  'diagonal_down_right',
  'diagonal_down_left',
];

export function directionOffset(direction: ScanDirection, stride: number): number {
  switch (direction) {
    case 'horizontal':
      return 1;
    case 'vertical':
      return stride;
    case 'diagonal_down_right':
      return stride + 1;
    case 'diagonal_down_left':
      return stride - 1;
  }
}

/**
 * Read-only run scan. Every stone of `color` is tried as the start of a run
 * in each direction; the next WIN_LENGTH - 1 points are compared with the
 * board directly. A border cell ends any run, so the scan never leaves the
 * padded array.
 */
export function findWinningRun(state: GridState, color: StoneColor): WinningRun | null {
  assertStoneColor(color, 'WinDetection');
  const stones = state.stonesOf(color);

  for (const direction of SCAN_DIRECTIONS) {
    const offset = directionOffset(direction, state.stride);
    for (const start of stones) {
      const points = [start];
      for (let step = 1; step < WIN_LENGTH; step++) {
        const next = start + step * offset;
        if (state.getColor(next) !== color) break;
        points.push(next);
      }
      if (points.length === WIN_LENGTH) {
        return { color, direction, points };
      }
    }
  }

  return null;
}

export function checkWin(state: GridState, color: StoneColor): boolean {
  return findWinningRun(state, color) !== null;
}

export function checkState(state: GridState): GameStatus {
  if (checkWin(state, WHITE)) {
    return 'white_wins';
  }
  if (checkWin(state, BLACK)) {
    return 'black_wins';
  }
  if (!state.hasEmptyPoint()) {
    return 'board_full_no_winner';
  }
  return 'ongoing';
}

export function isGameDecided(state: GridState): boolean {
  return checkWin(state, WHITE) || checkWin(state, BLACK);
}
