import { CellState, StoneColor, assertStoneColor, colorName } from './boardUtil';
import {
  CaptureResult,
  groupOf,
  hasLiberty,
  isSimpleEye,
  libertiesOf,
  resolveCapture,
  resolveCapturesAround,
} from './connectivity';
import { EngineErrorCode, InvalidState } from './errors';
import { ColorIndexAudit, GridState } from './gridState';
import { formatPoint, renderBoard } from './notation';
import { PlacementValidationResult, isLegal, tryPlace, validatePlacement } from './placement';
import { GameStatus, WinningRun, checkState, checkWin, findWinningRun } from './winDetection';
import { config } from '../config';
import { logger } from '../utils/logger';

export interface GameBoardOptions {
  /**
   * Audit the per-color stone index after every mutation and throw
   * InvalidState on drift. Defaults to GOMOKU_AUDIT_INDEX.
   */
  auditIndex?: boolean;
}

/**
 * Aggregate root for one five-in-a-row board.
 *
 * Wraps a {@link GridState} and exposes the placement, connectivity and win
 * detection engines as methods. Placement never resolves captures; callers
 * that want Go-style captures invoke {@link resolveCapture} themselves.
 */
export class GameBoard {
  private state: GridState;
  private readonly auditIndex: boolean;

  constructor(size: number = config.board.defaultSize, options: GameBoardOptions = {}) {
    this.state = new GridState(size);
    this.auditIndex = options.auditIndex ?? config.board.auditIndex;
  }

  private static fromState(state: GridState, auditIndex: boolean): GameBoard {
    const board = new GameBoard(state.size, { auditIndex });
    board.state = state;
    return board;
  }

  get size(): number {
    return this.state.size;
  }

  get stride(): number {
    return this.state.stride;
  }

  get maxPoint(): number {
    return this.state.maxPoint;
  }

  get currentPlayer(): StoneColor {
    return this.state.currentPlayer;
  }

  get koRecapture(): number | null {
    return this.state.koRecapture;
  }

  setNextPlayer(color: StoneColor): void {
    assertStoneColor(color);
    this.state.currentPlayer = color;
  }

  pt(row: number, col: number): number {
    return this.state.pt(row, col);
  }

  getColor(point: number): CellState {
    return this.state.getColor(point);
  }

  neighbors(point: number): number[] {
    return this.state.neighbors(point);
  }

  diagonalNeighbors(point: number): number[] {
    return this.state.diagonalNeighbors(point);
  }

  emptyPoints(): number[] {
    return this.state.emptyPoints();
  }

  stonesOf(color: StoneColor): number[] {
    return this.state.stonesOf(color);
  }

  cellsSnapshot(): CellState[] {
    return this.state.cellsSnapshot();
  }

  // ---------------------------------------------------------------------------
  // Placement
  // ---------------------------------------------------------------------------

  validatePlacement(point: number, color: StoneColor): PlacementValidationResult {
    return validatePlacement(this.state, point, color);
  }

  tryPlace(point: number, color: StoneColor): boolean {
    const placed = tryPlace(this.state, point, color);
    if (placed) {
      this.afterMutation('tryPlace');
      if (logger.isDebugEnabled()) {
        this.logWinningRun(color);
      }
    }
    return placed;
  }

  isLegal(point: number, color: StoneColor): boolean {
    return isLegal(this.state, point, color);
  }

  // ---------------------------------------------------------------------------
  // Win detection
  // ---------------------------------------------------------------------------

  checkWin(color: StoneColor): boolean {
    return checkWin(this.state, color);
  }

  findWinningRun(color: StoneColor): WinningRun | null {
    return findWinningRun(this.state, color);
  }

  checkState(): GameStatus {
    return checkState(this.state);
  }

  // ---------------------------------------------------------------------------
  // Connectivity
  // ---------------------------------------------------------------------------

  groupOf(seed: number): Set<number> {
    return groupOf(this.state, seed);
  }

  hasLiberty(group: Iterable<number>): boolean {
    return hasLiberty(this.state, group);
  }

  libertiesOf(group: Iterable<number>): number[] {
    return libertiesOf(this.state, group);
  }

  resolveCapture(adjacentPoint: number): CaptureResult {
    const result = resolveCapture(this.state, adjacentPoint);
    if (result.captured) {
      this.afterMutation('resolveCapture');
    }
    return result;
  }

  resolveCapturesAround(playedPoint: number): CaptureResult {
    const result = resolveCapturesAround(this.state, playedPoint);
    if (result.captured) {
      this.afterMutation('resolveCapturesAround');
    }
    return result;
  }

  isSimpleEye(point: number, color: StoneColor): boolean {
    return isSimpleEye(this.state, point, color);
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  reset(): void {
    this.state.reset();
  }

  /** Independent board: no array is shared with this one. */
  copy(): GameBoard {
    return GameBoard.fromState(this.state.copy(), this.auditIndex);
  }

  auditColorIndex(): ColorIndexAudit {
    return this.state.auditColorIndex();
  }

  toString(): string {
    return renderBoard(this.state);
  }

  private logWinningRun(color: StoneColor): void {
    const run = findWinningRun(this.state, color);
    if (run) {
      logger.debug('Winning run completed', {
        component: 'GameBoard',
        color: colorName(color),
        direction: run.direction,
        points: run.points.map((p) => formatPoint(p, this.size)),
      });
    }
  }

  private afterMutation(operation: string): void {
    if (!this.auditIndex) return;
    const audit = this.state.auditColorIndex();
    if (!audit.consistent) {
      throw new InvalidState(
        EngineErrorCode.STATE_INDEX_DRIFT,
        'Color index no longer matches the board',
        { operation, faults: audit.faults },
        'GameBoard'
      );
    }
  }
}
