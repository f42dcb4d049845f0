import { BORDER, EMPTY, StoneColor, assertStoneColor, isBlackWhite, opponent } from './boardUtil';
import { EngineErrorCode, RulesViolation } from './errors';
import { GridState } from './gridState';
import { logger } from '../utils/logger';

/**
 * Outcome of {@link resolveCapture}. "Nothing captured" is a normal result,
 * reported with `captured: false` and an empty point list.
 */
export interface CaptureResult {
  captured: boolean;
  capturedPoints: number[];
  capturedCount: number;
  /** The captured point when exactly one stone was taken, otherwise null. */
  singleCapture: number | null;
}

function noCapture(): CaptureResult {
  return { captured: false, capturedPoints: [], capturedCount: 0, singleCapture: null };
}

/**
 * Maximal set of stones orthogonally connected to `seed` through its own
 * color. Iterative flood fill: explicit stack, one visited marker per point.
 */
export function groupOf(state: GridState, seed: number): Set<number> {
  const color = state.getColor(seed);
  if (!isBlackWhite(color)) {
    throw new RulesViolation(
      EngineErrorCode.RULES_NOT_A_STONE,
      'Group lookup requires a point holding a stone',
      { point: seed, cell: color },
      'Connectivity'
    );
  }

  const marker = new Array<boolean>(state.maxPoint).fill(false);
  const group = new Set<number>([seed]);
  const stack: number[] = [seed];
  marker[seed] = true;

  while (stack.length > 0) {
    const point = stack.pop();
    if (point === undefined) break;
    for (const nb of state.neighborsOfColor(point, color)) {
      if (!marker[nb]) {
        marker[nb] = true;
        group.add(nb);
        stack.push(nb);
      }
    }
  }

  return group;
}

export function hasLiberty(state: GridState, group: Iterable<number>): boolean {
  for (const stone of group) {
    if (state.neighborsOfColor(stone, EMPTY).length > 0) {
      return true;
    }
  }
  return false;
}

/** Distinct EMPTY points adjacent to the group, ascending. */
export function libertiesOf(state: GridState, group: Iterable<number>): number[] {
  const liberties = new Set<number>();
  for (const stone of group) {
    for (const nb of state.neighborsOfColor(stone, EMPTY)) {
      liberties.add(nb);
    }
  }
  return [...liberties].sort((a, b) => a - b);
}

/**
 * Remove the group at `adjacentPoint` if it has no liberty.
 *
 * A single-stone capture is recorded as the board's ko point; a larger
 * capture clears it.
 */
export function resolveCapture(state: GridState, adjacentPoint: number): CaptureResult {
  const block = groupOf(state, adjacentPoint);
  if (hasLiberty(state, block)) {
    return noCapture();
  }

  const capturedPoints = [...block].sort((a, b) => a - b);
  for (const point of capturedPoints) {
    state.removeStone(point);
  }

  const singleCapture = capturedPoints.length === 1 ? adjacentPoint : null;
  state.koRecapture = singleCapture;

  logger.debug('Captured group', {
    component: 'Connectivity',
    points: capturedPoints,
    count: capturedPoints.length,
  });

  return {
    captured: true,
    capturedPoints,
    capturedCount: capturedPoints.length,
    singleCapture,
  };
}

/**
 * Resolve captures of every opponent group touching a freshly played stone
 * at `playedPoint`. Groups are checked one neighbor at a time, so a group
 * touching the stone on two sides is only removed once.
 */
export function resolveCapturesAround(state: GridState, playedPoint: number): CaptureResult {
  const color = state.getColor(playedPoint);
  if (!isBlackWhite(color)) {
    throw new RulesViolation(
      EngineErrorCode.RULES_NOT_A_STONE,
      'Capture check requires a point holding a stone',
      { point: playedPoint, cell: color },
      'Connectivity'
    );
  }

  const capturedPoints: number[] = [];
  for (const nb of state.neighborsOfColor(playedPoint, opponent(color))) {
    // An earlier capture in this loop may already have emptied this neighbor.
    if (state.getColor(nb) !== opponent(color)) continue;
    capturedPoints.push(...resolveCapture(state, nb).capturedPoints);
  }

  if (capturedPoints.length === 0) {
    return noCapture();
  }

  capturedPoints.sort((a, b) => a - b);
  const singleCapture = capturedPoints.length === 1 ? capturedPoints[0] : null;
  state.koRecapture = singleCapture;

  return {
    captured: true,
    capturedPoints,
    capturedCount: capturedPoints.length,
    singleCapture,
  };
}

/**
 * True when every orthogonal neighbor of `point` is BORDER or `color`.
 */
export function isSurrounded(state: GridState, point: number, color: StoneColor): boolean {
  assertStoneColor(color, 'Connectivity');
  return state.neighbors(point).every((nb) => {
    const nbColor = state.getColor(nb);
    return nbColor === BORDER || nbColor === color;
  });
}

/**
 * Simple eye test. Surrounded points are eyes unless too many diagonals
 * belong to the opponent: one is tolerated in the middle of the board,
 * none once a diagonal runs off the edge.
 */
export function isSimpleEye(state: GridState, point: number, color: StoneColor): boolean {
  if (!isSurrounded(state, point, color)) {
    return false;
  }

  const oppColor = opponent(color);
  let falseCount = 0;
  let atEdge = 0;
  for (const d of state.diagonalNeighbors(point)) {
    const dColor = state.getColor(d);
    if (dColor === BORDER) {
      atEdge = 1;
    } else if (dColor === oppColor) {
      falseCount += 1;
    }
  }
  return falseCount <= 1 - atEdge;
}
