import type { AxialCoords, DragMove, GameState, PieceType, PlayerColor } from '../../types/game';
import type { Board } from '../Board';
import { hasPieces, topPiece } from '../field';
import { coordsEqual, formatCoords, formsLine, isAdjacent, lineBetween } from '../hexCoords';
import { SPIDER_STEPS } from '../rulesConfig';
import { invalid, VALID, ValidationErrorCode, ValidationResult } from '../types';

/**
 * Validates moving the top piece of a field.
 *
 * General checks come first (bee placed, own piece on top, destination
 * free unless the mover is a beetle, swarm stays connected). The piece's
 * own movement rule is then checked against the board with the moved
 * piece lifted off, so a piece never counts as its own support.
 */
export function validateDragMove(
  state: GameState,
  color: PlayerColor,
  move: DragMove
): ValidationResult {
  const { board } = state;
  const { start, destination } = move;

  if (!board.hasPlacedBee(color)) {
    return invalid(
      ValidationErrorCode.DRAG_BEE_NOT_PLACED,
      'The bee has to be placed before pieces can be moved'
    );
  }

  const startField = board.field(start);
  if (!startField) {
    return invalid(
      ValidationErrorCode.GENERAL_POSITION_OFF_BOARD,
      `Start ${formatCoords(start)} is not on the board`
    );
  }

  const destinationField = board.field(destination);
  if (!destinationField) {
    return invalid(
      ValidationErrorCode.GENERAL_POSITION_OFF_BOARD,
      `Destination ${formatCoords(destination)} is not on the board`
    );
  }

  const piece = topPiece(startField);
  if (!piece) {
    return invalid(
      ValidationErrorCode.DRAG_NO_PIECE_AT_START,
      `There is no piece at ${formatCoords(start)}`
    );
  }

  if (piece.owner !== color) {
    return invalid(
      ValidationErrorCode.DRAG_NOT_OWN_PIECE,
      `The piece at ${formatCoords(start)} is not owned by ${color}`
    );
  }

  if (coordsEqual(start, destination)) {
    return invalid(ValidationErrorCode.DRAG_SAME_FIELD, 'Start and destination are the same field');
  }

  if (destinationField.isObstructed) {
    return invalid(
      ValidationErrorCode.DRAG_DESTINATION_OBSTRUCTED,
      `Destination ${formatCoords(destination)} is obstructed`
    );
  }

  if (hasPieces(destinationField) && piece.type !== 'BEETLE') {
    return invalid(
      ValidationErrorCode.DRAG_DESTINATION_OCCUPIED,
      'Only beetles can climb on other pieces'
    );
  }

  const lifted = board.withPieceRemoved(start);

  if (!lifted.isSwarmConnected()) {
    return invalid(
      ValidationErrorCode.DRAG_SWARM_DISCONNECTED,
      'Moving the piece would disconnect the swarm'
    );
  }

  if (!hasPieces(destinationField) && !lifted.isNextToPiece(destination)) {
    return invalid(
      ValidationErrorCode.DRAG_DESTINATION_DETACHED,
      'The destination is not connected to the swarm'
    );
  }

  if (!canPieceTypeReach(piece.type, lifted, start, destination)) {
    return invalid(
      ValidationErrorCode.DRAG_INVALID_PIECE_MOVEMENT,
      `A ${piece.type} cannot move from ${formatCoords(start)} to ${formatCoords(destination)}`,
      { pieceType: piece.type }
    );
  }

  return VALID;
}

/**
 * Movement rule of each piece type. `board` must no longer hold the moving
 * piece.
 */
export function canPieceTypeReach(
  type: PieceType,
  board: Board,
  start: AxialCoords,
  destination: AxialCoords
): boolean {
  switch (type) {
    case 'BEE':
      return isAdjacent(start, destination) && board.canMoveBetween(start, destination);
    case 'BEETLE':
      return canBeetleMove(board, start, destination);
    case 'GRASSHOPPER':
      return (
        formsLine(start, destination) &&
        !isAdjacent(start, destination) &&
        lineBetween(start, destination).every((coords) => {
          const field = board.field(coords);
          return field !== undefined && hasPieces(field);
        })
      );
    case 'ANT':
      return board.connectedByBoundaryPath(start, destination);
    case 'SPIDER':
      return board.reachableInExactly(start, destination, SPIDER_STEPS);
  }
}

// A beetle steps to any adjacent field as long as it stays on or next to
// the swarm while doing so.
function canBeetleMove(board: Board, start: AxialCoords, destination: AxialCoords): boolean {
  if (!isAdjacent(start, destination)) {
    return false;
  }

  const startField = board.field(start);
  const destinationField = board.field(destination);
  return (
    board.sharedNeighbors(start, destination).some(({ field }) => hasPieces(field)) ||
    (destinationField !== undefined && hasPieces(destinationField)) ||
    (startField !== undefined && hasPieces(startField))
  );
}
