import {
  BLACK,
  BORDER,
  EMPTY,
  MAX_BOARD_SIZE,
  MIN_BOARD_SIZE,
  WHITE,
  assertBoardSize,
  assertStoneColor,
  colorName,
  coordToPoint,
  isBlackWhite,
  maxPointFor,
  opponent,
  pointToCoord,
  pointsWhere,
} from '../../../src/engine/boardUtil';
import type { CellState } from '../../../src/engine/boardUtil';
import {
  BoardConstraintViolation,
  EngineErrorCode,
  RulesViolation,
} from '../../../src/engine/errors';

describe('boardUtil', () => {
  describe('coordToPoint', () => {
    it('maps 1-based coordinates into the padded array', () => {
      expect(coordToPoint(1, 1, 9)).toBe(11);
      expect(coordToPoint(1, 9, 9)).toBe(19);
      expect(coordToPoint(2, 1, 9)).toBe(21);
      expect(coordToPoint(9, 9, 9)).toBe(99);
    });

    it('rejects coordinates outside the board', () => {
      expect(() => coordToPoint(0, 1, 9)).toThrow(BoardConstraintViolation);
      expect(() => coordToPoint(1, 10, 9)).toThrow(BoardConstraintViolation);
      expect(() => coordToPoint(1.5, 1, 9)).toThrow(BoardConstraintViolation);

      try {
        coordToPoint(10, 1, 9);
        throw new Error('expected coordToPoint to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(BoardConstraintViolation);
        expect((error as BoardConstraintViolation).code).toBe(
          EngineErrorCode.BOARD_INVALID_COORDINATE
        );
      }
    });
  });

  describe('pointToCoord', () => {
    it('inverts coordToPoint for interior points', () => {
      expect(pointToCoord(11, 9)).toEqual({ row: 1, col: 1 });
      expect(pointToCoord(57, 9)).toEqual({ row: 5, col: 7 });
    });

    it('returns null for border points', () => {
      expect(pointToCoord(0, 9)).toBeNull();
      expect(pointToCoord(10, 9)).toBeNull();
      expect(pointToCoord(100, 9)).toBeNull();
      expect(pointToCoord(110, 9)).toBeNull();
    });
  });

  it('computes the padded array length', () => {
    expect(maxPointFor(2)).toBe(13);
    expect(maxPointFor(9)).toBe(111);
    expect(maxPointFor(19)).toBe(421);
  });

  it('swaps colors with opponent', () => {
    expect(opponent(BLACK)).toBe(WHITE);
    expect(opponent(WHITE)).toBe(BLACK);
  });

  it('recognises stone colors', () => {
    expect(isBlackWhite(BLACK)).toBe(true);
    expect(isBlackWhite(WHITE)).toBe(true);
    expect(isBlackWhite(EMPTY)).toBe(false);
    expect(isBlackWhite(BORDER)).toBe(false);
    expect(isBlackWhite('black')).toBe(false);
    expect(() => assertStoneColor(EMPTY)).toThrow(RulesViolation);
  });

  it('names every cell state', () => {
    const states: CellState[] = [EMPTY, BLACK, WHITE, BORDER];
    expect(states.map(colorName)).toEqual([
      'empty',
      'black',
      'white',
      'border',
    ]);
  });

  it('accepts sizes from MIN_BOARD_SIZE to MAX_BOARD_SIZE only', () => {
    expect(() => assertBoardSize(MIN_BOARD_SIZE)).not.toThrow();
    expect(() => assertBoardSize(MAX_BOARD_SIZE)).not.toThrow();
    expect(() => assertBoardSize(MIN_BOARD_SIZE - 1)).toThrow(BoardConstraintViolation);
    expect(() => assertBoardSize(MAX_BOARD_SIZE + 1)).toThrow(BoardConstraintViolation);
    expect(() => assertBoardSize(7.5)).toThrow(BoardConstraintViolation);
  });

  it('extracts matching indices in ascending order', () => {
    expect(pointsWhere([BORDER, EMPTY, BLACK, EMPTY, WHITE], (c) => c === EMPTY)).toEqual([1, 3]);
    expect(pointsWhere([], () => true)).toEqual([]);
  });
});
