/**
 * Engine Domain Errors - Structured error types for the rules engine layer
 *
 * This module provides consistent error types for engine-level errors that occur
 * during action validation, state mutation, and turn-phase enforcement.
 *
 * Error Categories:
 * - **RulesViolation**: Actions that break the game rules (bad selection,
 *   destination, build or placement; action submitted out of phase; action
 *   submitted after the game ended)
 * - **InvalidState**: Corrupted or unexpected game state
 * - **BoardConstraintViolation**: Geometry issues with board operations
 *
 * Expected invalid input is *returned* by the engine inside an ActionResult.
 * These classes are thrown only when a caller asks for something that must
 * succeed (e.g. applying a generated Move during search) or when an internal
 * invariant breaks.
 *
 * Usage:
 * ```typescript
 * import { RulesViolation, EngineErrorCode } from './errors';
 *
 * throw new RulesViolation(
 *   EngineErrorCode.RULES_INVALID_BUILD,
 *   'Cannot build on a capped cell',
 *   { at: { x: 2, y: 3 } }
 * );
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine domain error codes.
 *
 * Error codes are prefixed by category:
 * - RULES_*: Game rule violations
 * - STATE_*: Game state corruption/inconsistency or terminal state
 * - BOARD_*: Board geometry issues
 * - FSM_*: Turn-phase state machine errors
 */
export enum EngineErrorCode {
  // Rules Violations
  /** Worker is not the active player's, or has no legal destination */
  RULES_INVALID_SELECTION = 'RULES_INVALID_SELECTION',
  /** Destination breaks adjacency, climb, occupancy or dome rules */
  RULES_INVALID_DESTINATION = 'RULES_INVALID_DESTINATION',
  /** Build site breaks adjacency, occupancy or dome rules */
  RULES_INVALID_BUILD = 'RULES_INVALID_BUILD',
  /** Setup placement off-board or onto an occupied cell */
  RULES_INVALID_PLACEMENT = 'RULES_INVALID_PLACEMENT',

  // State Errors
  /** Action submitted after the game reached a terminal state */
  STATE_GAME_ALREADY_OVER = 'STATE_GAME_ALREADY_OVER',
  /** Expected worker missing from the worker table */
  STATE_WORKER_NOT_FOUND = 'STATE_WORKER_NOT_FOUND',
  /** Two workers share a cell, or a cell holds an impossible height */
  STATE_INVARIANT_BROKEN = 'STATE_INVARIANT_BROKEN',

  // Board Constraint Violations
  /** Position outside the 5×5 grid */
  BOARD_INVALID_POSITION = 'BOARD_INVALID_POSITION',
  /** Attempt to build on a domed cell */
  BOARD_CELL_CAPPED = 'BOARD_CELL_CAPPED',

  // FSM Errors
  /** Action type does not match the current phase */
  FSM_OUT_OF_PHASE = 'FSM_OUT_OF_PHASE',

  // Internal Errors - should never happen in correct code
  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

/**
 * Maps error code prefixes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  RULES_: 'Game rule violation',
  STATE_: 'Unexpected or terminal game state',
  BOARD_: 'Board geometry constraint violation',
  FSM_: 'Invalid turn-phase transition',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine domain errors.
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g., 'MovementValidator', 'Search') */
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

/**
 * JSON representation of an EngineError.
 */
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

/**
 * Error for game rule violations.
 *
 * Examples:
 * - Selecting the opponent's worker
 * - Climbing two levels in one move
 * - Building during worker selection
 */
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
 * Error for corrupted or unexpected game state.
 *
 * This typically indicates either a bug in the engine or a hand-built state
 * that does not respect the board/worker invariants.
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

/**
 * Error for board geometry violations (off-board positions, building on a dome).
 */
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

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isRulesViolation(error: unknown): error is RulesViolation {
  return error instanceof RulesViolation;
}

export function isInvalidState(error: unknown): error is InvalidState {
  return error instanceof InvalidState;
}

export function isBoardConstraintViolation(error: unknown): error is BoardConstraintViolation {
  return error instanceof BoardConstraintViolation;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Wrap an unknown error in an EngineError.
 *
 * Useful for catching and normalizing errors at host boundaries.
 */
export function wrapEngineError(
  error: unknown,
  domain: string = 'Engine',
  context: Record<string, unknown> = {}
): EngineError {
  if (isEngineError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new EngineError(
    EngineErrorCode.INTERNAL_ASSERTION_FAILED,
    message,
    {
      ...context,
      originalStack: stack,
    },
    domain
  );
}
