/**
 * Public surface of the board engine.
 *
 * Hosts normally work with {@link GameBoard}; the function modules are
 * exported for callers that manage a {@link GridState} directly.
 */

export * from './boardUtil';
export * from './errors';
export { GridState, auditStoneIndex } from './gridState';
export type { ColorIndexAudit, ColorIndexFault } from './gridState';
export { validatePlacement, tryPlace, isLegal } from './placement';
export type { PlacementRejectionCode, PlacementValidationResult } from './placement';
export {
  groupOf,
  hasLiberty,
  libertiesOf,
  resolveCapture,
  resolveCapturesAround,
  isSurrounded,
  isSimpleEye,
} from './connectivity';
export type { CaptureResult } from './connectivity';
export {
  SCAN_DIRECTIONS,
  directionOffset,
  findWinningRun,
  checkWin,
  checkState,
  isGameDecided,
} from './winDetection';
export type { GameStatus, ScanDirection, WinningRun } from './winDetection';
export { formatPoint, renderBoard } from './notation';
export { GameBoard } from './GameBoard';
export type { GameBoardOptions } from './GameBoard';
