import type { GameState, PlayerColor, SetMove } from '../../types/game';
import { opponentOf } from '../../types/game';
import { BEE_DEADLINE_ROUND } from '../rulesConfig';
import { formatCoords } from '../hexCoords';
import { invalid, VALID, ValidationErrorCode, ValidationResult } from '../types';
import { getRound, hasPlacedNothing } from '../initialState';

/**
 * Validates placing an undeployed piece.
 *
 * Checks, in order:
 * - the piece belongs to the mover and is still undeployed
 * - the destination is on the board and neither obstructed nor stacked
 * - on an empty board any destination is fine
 * - a player's first piece must touch the opponent
 * - from round {@link BEE_DEADLINE_ROUND} on, an unplaced bee must be placed
 * - later pieces must touch an own field and no opponent field
 */
export function validateSetMove(
  state: GameState,
  color: PlayerColor,
  move: SetMove
): ValidationResult {
  const { board } = state;
  const { piece, destination } = move;
  const opponent = opponentOf(color);

  if (piece.owner !== color) {
    return invalid(ValidationErrorCode.SET_NOT_OWN_PIECE, 'Piece has to be owned by the current player', {
      piece,
      color,
    });
  }

  if (!board.contains(destination)) {
    return invalid(
      ValidationErrorCode.GENERAL_POSITION_OFF_BOARD,
      `Destination ${formatCoords(destination)} is not on the board`
    );
  }

  if (board.isOccupied(destination)) {
    return invalid(
      ValidationErrorCode.SET_DESTINATION_OCCUPIED,
      `Destination ${formatCoords(destination)} is occupied`
    );
  }

  if (!state.undeployedPieces[color].some((p) => p.type === piece.type)) {
    return invalid(
      ValidationErrorCode.SET_PIECE_NOT_UNDEPLOYED,
      `No undeployed ${piece.type} left for ${color}`
    );
  }

  if (!board.hasPieces()) {
    return VALID;
  }

  if (hasPlacedNothing(state, color)) {
    return board.isNextTo(opponent, destination)
      ? VALID
      : invalid(
          ValidationErrorCode.SET_MUST_TOUCH_OPPONENT,
          'The first piece has to be placed next to an opponent piece'
        );
  }

  if (
    getRound(state) >= BEE_DEADLINE_ROUND &&
    !board.hasPlacedBee(color) &&
    piece.type !== 'BEE'
  ) {
    return invalid(
      ValidationErrorCode.SET_BEE_REQUIRED,
      `The bee has to be placed by round ${BEE_DEADLINE_ROUND + 1}`
    );
  }

  if (!board.isNextTo(color, destination)) {
    return invalid(
      ValidationErrorCode.SET_NOT_NEXT_TO_OWN,
      'Piece has to be placed next to an own piece'
    );
  }

  if (board.isNextTo(opponent, destination)) {
    return invalid(
      ValidationErrorCode.SET_NEXT_TO_OPPONENT,
      'Piece must not be placed next to an opponent piece'
    );
  }

  return VALID;
}
