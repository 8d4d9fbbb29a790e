import type { GameState, Move, Piece } from '../types/game';
import { opponentOf, piecesEqual } from '../types/game';
import type { Board } from './Board';
import { EngineErrorCode, InvalidState, RulesViolation } from './errors';
import { topPiece } from './field';
import { formatCoords } from './hexCoords';
import { validateMove } from './moveValidation';
import { getGameOutcome } from './victoryLogic';

/**
 * Applies a move for the player to move and returns the successor state.
 * The input state is left untouched.
 *
 * @throws RulesViolation when the game is over or the move is illegal
 */
export function applyMove(state: GameState, move: Move): GameState {
  if (getGameOutcome(state).isOver) {
    throw new RulesViolation(EngineErrorCode.RULES_GAME_OVER, 'The game is already over', {
      turn: state.turn,
    });
  }

  const color = state.currentPlayerColor;
  const validation = validateMove(state, color, move);
  if (!validation.valid) {
    throw new RulesViolation(EngineErrorCode.RULES_ILLEGAL_MOVE, validation.reason, {
      move,
      color,
      validationCode: validation.code,
    });
  }

  let board: Board = state.board;
  const undeployedPieces = {
    RED: [...state.undeployedPieces.RED],
    BLUE: [...state.undeployedPieces.BLUE],
  };

  switch (move.type) {
    case 'set': {
      undeployedPieces[color] = withoutOne(undeployedPieces[color], move.piece);
      board = board.withPiecePushed(move.destination, move.piece);
      break;
    }
    case 'drag': {
      const startField = board.field(move.start);
      const piece = startField ? topPiece(startField) : undefined;
      if (!piece) {
        throw new InvalidState(
          EngineErrorCode.STATE_FIELD_EMPTY,
          `No piece to drag at ${formatCoords(move.start)}`
        );
      }
      board = board.withPieceRemoved(move.start).withPiecePushed(move.destination, piece);
      break;
    }
    case 'skip':
      break;
  }

  return {
    ...state,
    turn: state.turn + 1,
    currentPlayerColor: opponentOf(color),
    board,
    undeployedPieces,
    lastMove: move,
  };
}

function withoutOne(pieces: Piece[], piece: Piece): Piece[] {
  const index = pieces.findIndex((p) => piecesEqual(p, piece));
  if (index < 0) {
    throw new InvalidState(
      EngineErrorCode.STATE_PIECE_NOT_UNDEPLOYED,
      `${piece.owner} ${piece.type} is not undeployed`,
      { piece }
    );
  }
  return [...pieces.slice(0, index), ...pieces.slice(index + 1)];
}
