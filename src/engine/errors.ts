/**
 * Engine Domain Errors - Structured error types for the board engine
 *
 * Only precondition failures are thrown. Ordinary rule outcomes (occupied
 * point, decided game, full board) are reported as `false` by the placement
 * engine and never surface as errors.
 *
 * Error Categories:
 * - **RulesViolation**: a call that makes no sense under the game rules
 *   (placing an EMPTY "color", flood-filling from an empty point)
 * - **InvalidState**: bookkeeping that no longer matches the board
 * - **BoardConstraintViolation**: sizes, points or coordinates outside the grid
 *
 * Usage:
 * ```typescript
 * throw new BoardConstraintViolation(
 *   EngineErrorCode.BOARD_INVALID_POINT,
 *   'Point is outside the padded grid',
 *   { point: 400, maxPoint: 111 }
 * );
 * ```
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Error codes are prefixed by category:
 * - RULES_*: rule-level precondition failures
 * - STATE_*: bookkeeping corruption
 * - BOARD_*: grid geometry issues
 * - INTERNAL_*: bugs
 */
export enum EngineErrorCode {
  /** Color argument is not BLACK or WHITE */
  RULES_INVALID_COLOR = 'RULES_INVALID_COLOR',
  /** Group/capture requested for a point that holds no stone */
  RULES_NOT_A_STONE = 'RULES_NOT_A_STONE',

  /** Per-color stone index disagrees with the cell array */
  STATE_INDEX_DRIFT = 'STATE_INDEX_DRIFT',

  /** Board size outside MIN_BOARD_SIZE..MAX_BOARD_SIZE */
  BOARD_INVALID_SIZE = 'BOARD_INVALID_SIZE',
  /** Point is not an index into the padded cell array */
  BOARD_INVALID_POINT = 'BOARD_INVALID_POINT',
  /** Row/column pair outside 1..size */
  BOARD_INVALID_COORDINATE = 'BOARD_INVALID_COORDINATE',

  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  RULES_: 'Rule precondition violation',
  STATE_: 'Corrupted or unexpected board state',
  BOARD_: 'Board geometry constraint violation',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Component that raised the error (e.g. 'Placement', 'Connectivity') */
  readonly domain: string;

  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

export class RulesViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Rules'
  ) {
    super(code, message, context, domain);
    this.name = 'RulesViolation';
    Object.setPrototypeOf(this, RulesViolation.prototype);
  }
}

/**
 * Thrown when the stone index and the cell array disagree. This is always a
 * bug in a write path, never a user error.
 */
export class InvalidState extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'State'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidState';
    Object.setPrototypeOf(this, InvalidState.prototype);
  }
}

export class BoardConstraintViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Board'
  ) {
    super(code, message, context, domain);
    this.name = 'BoardConstraintViolation';
    Object.setPrototypeOf(this, BoardConstraintViolation.prototype);
  }
}
