import {
  BLACK,
  BORDER,
  CellState,
  EMPTY,
  STONE_COLORS,
  StoneColor,
  WHITE,
  assertBoardSize,
  assertStoneColor,
  coordToPoint,
  maxPointFor,
  pointsWhere,
} from './boardUtil';
import { BoardConstraintViolation, EngineErrorCode, InvalidState } from './errors';

/**
 * Discrepancies between a color's stone index and the cell array.
 */
export interface ColorIndexFault {
  color: StoneColor;
  /** Points holding the color that the index does not list. */
  missing: number[];
  /** Points the index lists whose cell holds something else. */
  extra: number[];
  /** True when the index is not strictly ascending (unsorted or duplicated). */
  misordered: boolean;
}

export interface ColorIndexAudit {
  consistent: boolean;
  faults: ColorIndexFault[];
}

/** Position of `point` in an ascending list (first index not less than it). */
function lowerBound(list: readonly number[], point: number): number {
  let lo = 0;
  let hi = list.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (list[mid] < point) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/**
 * Compare a per-color stone index against the cell array it describes.
 */
export function auditStoneIndex(
  cells: readonly CellState[],
  colorIndex: Readonly<Record<StoneColor, readonly number[]>>
): ColorIndexAudit {
  const faults: ColorIndexFault[] = [];

  for (const color of STONE_COLORS) {
    const expected = new Set(pointsWhere(cells, (cell) => cell === color));
    const actual = colorIndex[color];
    const listed = new Set(actual);

    const missing = [...expected].filter((point) => !listed.has(point));
    const extra = actual.filter((point) => !expected.has(point));
    const misordered = actual.some((point, i) => i > 0 && actual[i - 1] >= point);

    if (missing.length > 0 || extra.length > 0 || misordered) {
      faults.push({ color, missing, extra, misordered });
    }
  }

  return { consistent: faults.length === 0, faults };
}

/**
 * Padded cell array plus per-color stone index.
 *
 * Reads are unrestricted. Writes go through {@link placeStone} and
 * {@link removeStone} only, which keep each color's index ascending and
 * duplicate-free; the placement and connectivity engines are their sole
 * callers.
 */
export class GridState {
  readonly size: number;
  /** Row-to-row index delta, including the shared border column. */
  readonly stride: number;
  readonly maxPoint: number;

  /** Color that moves next. Informational; placement does not enforce turns. */
  currentPlayer: StoneColor = BLACK;
  /** Point of the last single-stone capture, kept for a future ko rule. */
  koRecapture: number | null = null;

  private cells: CellState[];
  private colorIndex: Record<StoneColor, number[]>;

  constructor(size: number) {
    assertBoardSize(size);
    this.size = size;
    this.stride = size + 1;
    this.maxPoint = maxPointFor(size);
    this.cells = this.createEmptyCells();
    this.colorIndex = { [BLACK]: [], [WHITE]: [] };
  }

  /** Restore the fresh-board state: all interior cells EMPTY, no stones. */
  reset(): void {
    this.cells = this.createEmptyCells();
    this.colorIndex = { [BLACK]: [], [WHITE]: [] };
    this.currentPlayer = BLACK;
    this.koRecapture = null;
  }

  /**
   * Fully independent copy: no array is shared with this instance.
   */
  copy(): GridState {
    const clone = new GridState(this.size);
    clone.cells = this.cells.slice();
    clone.colorIndex = {
      [BLACK]: this.colorIndex[BLACK].slice(),
      [WHITE]: this.colorIndex[WHITE].slice(),
    };
    clone.currentPlayer = this.currentPlayer;
    clone.koRecapture = this.koRecapture;
    return clone;
  }

  rowStart(row: number): number {
    if (!Number.isInteger(row) || row < 1 || row > this.size) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_COORDINATE,
        `Row ${row} is outside a ${this.size}x${this.size} board`,
        { row, size: this.size }
      );
    }
    return row * this.stride + 1;
  }

  pt(row: number, col: number): number {
    return coordToPoint(row, col, this.size);
  }

  isValidPoint(point: number): boolean {
    return Number.isInteger(point) && point >= 0 && point < this.maxPoint;
  }

  assertValidPoint(point: number): void {
    if (!this.isValidPoint(point)) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_POINT,
        'Point is outside the padded grid',
        { point, maxPoint: this.maxPoint }
      );
    }
  }

  getColor(point: number): CellState {
    this.assertValidPoint(point);
    return this.cells[point];
  }

  /** West, east, north, south. */
  neighbors(point: number): number[] {
    return [point - 1, point + 1, point - this.stride, point + this.stride];
  }

  /** North-west, north-east, south-west, south-east. */
  diagonalNeighbors(point: number): number[] {
    return [
      point - this.stride - 1,
      point - this.stride + 1,
      point + this.stride - 1,
      point + this.stride + 1,
    ];
  }

  neighborsOfColor(point: number, color: CellState): number[] {
    return this.neighbors(point).filter((nb) => this.getColor(nb) === color);
  }

  emptyPoints(): number[] {
    return pointsWhere(this.cells, (cell) => cell === EMPTY);
  }

  hasEmptyPoint(): boolean {
    return this.cells.includes(EMPTY);
  }

  /** Ascending copy of the points holding `color`. */
  stonesOf(color: StoneColor): number[] {
    assertStoneColor(color);
    return this.colorIndex[color].slice();
  }

  /** Copy of the raw cell array. */
  cellsSnapshot(): CellState[] {
    return this.cells.slice();
  }

  placeStone(point: number, color: StoneColor): void {
    this.assertValidPoint(point);
    if (this.cells[point] !== EMPTY) {
      throw new InvalidState(
        EngineErrorCode.STATE_INDEX_DRIFT,
        'Stone written over a non-empty cell',
        { point, cell: this.cells[point] }
      );
    }
    this.cells[point] = color;
    const list = this.colorIndex[color];
    list.splice(lowerBound(list, point), 0, point);
  }

  removeStone(point: number): void {
    this.assertValidPoint(point);
    const cell = this.cells[point];
    if (cell !== BLACK && cell !== WHITE) {
      throw new InvalidState(
        EngineErrorCode.STATE_INDEX_DRIFT,
        'Stone removed from a cell without a stone',
        { point, cell }
      );
    }
    const list = this.colorIndex[cell];
    const at = lowerBound(list, point);
    if (list[at] !== point) {
      throw new InvalidState(
        EngineErrorCode.STATE_INDEX_DRIFT,
        'Stone on the board is missing from its color index',
        { point, color: cell }
      );
    }
    this.cells[point] = EMPTY;
    list.splice(at, 1);
  }

  /**
   * Recompute every color's stone list from the cells and compare it with
   * the maintained index.
   */
  auditColorIndex(): ColorIndexAudit {
    return auditStoneIndex(this.cells, this.colorIndex);
  }

  private createEmptyCells(): CellState[] {
    const cells = new Array<CellState>(this.maxPoint).fill(BORDER);
    for (let row = 1; row <= this.size; row++) {
      const start = this.rowStart(row);
      cells.fill(EMPTY, start, start + this.size);
    }
    return cells;
  }
}
