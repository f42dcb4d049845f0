import { EMPTY, StoneColor, assertStoneColor, colorName } from './boardUtil';
import { GridState } from './gridState';
import { isGameDecided } from './winDetection';
import { logger } from '../utils/logger';

export type PlacementRejectionCode =
  | 'RULES_GAME_DECIDED'
  | 'RULES_BOARD_FULL'
  | 'RULES_POINT_OCCUPIED';

/**
 * Result of validating a placement. Rejections carry a reason and a
 * machine-readable code; they are ordinary outcomes, not errors.
 */
export interface PlacementValidationResult {
  valid: boolean;
  reason?: string;
  code?: PlacementRejectionCode;
}

/**
 * Check a prospective placement without touching the board.
 *
 * Throws only for malformed input (a point outside the padded grid or a
 * color other than BLACK/WHITE). Rejection checks run in a fixed order:
 * decided game, full board, occupied target. A BORDER target counts as
 * occupied.
 */
export function validatePlacement(
  state: GridState,
  point: number,
  color: StoneColor
): PlacementValidationResult {
  state.assertValidPoint(point);
  assertStoneColor(color, 'Placement');

  if (isGameDecided(state)) {
    return { valid: false, code: 'RULES_GAME_DECIDED', reason: 'The game has already been won' };
  }

  if (!state.hasEmptyPoint()) {
    return { valid: false, code: 'RULES_BOARD_FULL', reason: 'The board has no empty points' };
  }

  const target = state.getColor(point);
  if (target !== EMPTY) {
    return {
      valid: false,
      code: 'RULES_POINT_OCCUPIED',
      reason: `Point holds ${colorName(target)}`,
    };
  }

  return { valid: true };
}

/**
 * Place a stone of `color` on `point`. Returns false, leaving the board
 * untouched, when the placement is rejected. Never triggers capture.
 */
export function tryPlace(state: GridState, point: number, color: StoneColor): boolean {
  const validation = validatePlacement(state, point, color);
  if (!validation.valid) {
    if (validation.code === 'RULES_BOARD_FULL') {
      logger.warn('Board is full, no move can be played', {
        component: 'Placement',
        point,
        color: colorName(color),
      });
    }
    return false;
  }

  state.placeStone(point, color);
  return true;
}

/**
 * Legality query. Plays the move on a copy, so the caller's board is never
 * mutated whatever the placement does.
 */
export function isLegal(state: GridState, point: number, color: StoneColor): boolean {
  const scratch = state.copy();
  return tryPlace(scratch, point, color);
}
