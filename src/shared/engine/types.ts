// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Machine-readable reasons for rejecting a move.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR
 * - GENERAL_*: Cross-domain errors
 * - SET_*: Placing an undeployed piece
 * - DRAG_*: Moving a piece on the board
 * - SKIP_*: Passing the turn
 */
export enum ValidationErrorCode {
  // General
  GENERAL_POSITION_OFF_BOARD = 'GENERAL_POSITION_OFF_BOARD',

  // Set
  SET_NOT_OWN_PIECE = 'SET_NOT_OWN_PIECE',
  SET_DESTINATION_OCCUPIED = 'SET_DESTINATION_OCCUPIED',
  SET_PIECE_NOT_UNDEPLOYED = 'SET_PIECE_NOT_UNDEPLOYED',
  SET_MUST_TOUCH_OPPONENT = 'SET_MUST_TOUCH_OPPONENT',
  SET_BEE_REQUIRED = 'SET_BEE_REQUIRED',
  SET_NOT_NEXT_TO_OWN = 'SET_NOT_NEXT_TO_OWN',
  SET_NEXT_TO_OPPONENT = 'SET_NEXT_TO_OPPONENT',

  // Drag
  DRAG_BEE_NOT_PLACED = 'DRAG_BEE_NOT_PLACED',
  DRAG_NO_PIECE_AT_START = 'DRAG_NO_PIECE_AT_START',
  DRAG_NOT_OWN_PIECE = 'DRAG_NOT_OWN_PIECE',
  DRAG_SAME_FIELD = 'DRAG_SAME_FIELD',
  DRAG_DESTINATION_OBSTRUCTED = 'DRAG_DESTINATION_OBSTRUCTED',
  DRAG_DESTINATION_OCCUPIED = 'DRAG_DESTINATION_OCCUPIED',
  DRAG_SWARM_DISCONNECTED = 'DRAG_SWARM_DISCONNECTED',
  DRAG_DESTINATION_DETACHED = 'DRAG_DESTINATION_DETACHED',
  DRAG_INVALID_PIECE_MOVEMENT = 'DRAG_INVALID_PIECE_MOVEMENT',

  // Skip
  SKIP_OTHER_MOVES_AVAILABLE = 'SKIP_OTHER_MOVES_AVAILABLE',
}

/**
 * Result of validating a move. Validators never throw; callers that must
 * reject an invalid move convert a failure into a `RulesViolation`.
 */
export type ValidationResult =
  | { valid: true }
  | { valid: false; code: ValidationErrorCode; reason: string; context?: Record<string, unknown> };

export const VALID: ValidationResult = { valid: true };

/**
 * Helper to create a failed validation result.
 */
export function invalid(
  code: ValidationErrorCode,
  reason: string,
  context?: Record<string, unknown>
): ValidationResult {
  return context ? { valid: false, code, reason, context } : { valid: false, code, reason };
}
