/**
 * Engine Domain Errors - Structured error types for the Hive rules engine
 *
 * Move *validation* never throws: validators report a
 * `ValidationResult`. These errors are for places where an invalid
 * input cannot be reported as a value:
 *
 * - **RulesViolation**: applying a move that the rules reject
 * - **InvalidState**: a game state that breaks engine assumptions
 * - **NotationError**: malformed two-character field notation
 *
 * Usage:
 * ```typescript
 * import { RulesViolation, EngineErrorCode } from './errors';
 *
 * throw new RulesViolation(
 *   EngineErrorCode.RULES_ILLEGAL_MOVE,
 *   'Piece is not placed next to an own piece',
 *   { move }
 * );
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

export enum EngineErrorCode {
  // Rules Violations
  /** A move failed validation when applied */
  RULES_ILLEGAL_MOVE = 'RULES_ILLEGAL_MOVE',
  /** A move was applied after the game ended */
  RULES_GAME_OVER = 'RULES_GAME_OVER',

  // State Errors
  /** Undeployed piece expected but missing */
  STATE_PIECE_NOT_UNDEPLOYED = 'STATE_PIECE_NOT_UNDEPLOYED',
  /** Field expected to hold a piece is empty */
  STATE_FIELD_EMPTY = 'STATE_FIELD_EMPTY',

  // Notation Errors
  /** Field notation does not match the two-character syntax */
  NOTATION_INVALID = 'NOTATION_INVALID',
}

/**
 * Maps error code prefixes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  RULES_: 'Game rule violation',
  STATE_: 'Corrupted or unexpected game state',
  NOTATION_: 'Malformed field notation',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Engine area that raised the error (e.g. 'Rules', 'Board') */
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

  /** Serialize to a JSON-safe object for logging/debugging */
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

/**
 * Thrown when a move that the rules reject is applied to a state.
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
 * Thrown when a game state is inconsistent, e.g. an undeployed piece that
 * should exist is missing.
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

export class NotationError extends EngineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(EngineErrorCode.NOTATION_INVALID, message, context, 'Notation');
    this.name = 'NotationError';
    Object.setPrototypeOf(this, NotationError.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}
