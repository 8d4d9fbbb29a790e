import type { GameState, Move, PlayerColor } from '../types/game';
import { getPossibleSetMoves, getPossibleDragMoves } from './moveGeneration';
import { invalid, VALID, ValidationErrorCode, ValidationResult } from './types';
import { validateDragMove } from './validators/DragMoveValidator';
import { validateSetMove } from './validators/SetMoveValidator';

/**
 * Validates `move` as played by `color`. Turn order is not checked here;
 * see `applyMove`.
 */
export function validateMove(state: GameState, color: PlayerColor, move: Move): ValidationResult {
  switch (move.type) {
    case 'set':
      return validateSetMove(state, color, move);
    case 'drag':
      return validateDragMove(state, color, move);
    case 'skip':
      return validateSkipMove(state, color);
  }
}

export function validateSkipMove(state: GameState, color: PlayerColor): ValidationResult {
  if (getPossibleSetMoves(state, color).length > 0 || getPossibleDragMoves(state, color).length > 0) {
    return invalid(
      ValidationErrorCode.SKIP_OTHER_MOVES_AVAILABLE,
      'Skipping is only allowed when no other move is possible'
    );
  }
  return VALID;
}
