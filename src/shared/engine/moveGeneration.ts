import type {
  AxialCoords,
  DragMove,
  GameState,
  Move,
  Piece,
  PlayerColor,
  SetMove,
} from '../types/game';
import { opponentOf } from '../types/game';
import { engineTraceLog } from '../utils/envFlags';
import { topPiece } from './field';
import { coordsKey } from './hexCoords';
import { getRound, hasPlacedNothing } from './initialState';
import { BEE_DEADLINE_ROUND } from './rulesConfig';
import { validateDragMove } from './validators/DragMoveValidator';

// ═══════════════════════════════════════════════════════════════════════════
// SET MOVES
// ═══════════════════════════════════════════════════════════════════════════

export function getSetMoveDestinations(state: GameState, color: PlayerColor): AxialCoords[] {
  const { board } = state;

  if (!board.hasPieces()) {
    return board.emptyFields().map(({ coords }) => coords);
  }

  if (hasPlacedNothing(state, color)) {
    const destinations = new Map<string, AxialCoords>();
    for (const { coords } of board.fieldsOwnedBy(opponentOf(color))) {
      for (const neighbor of board.emptyNeighbors(coords)) {
        destinations.set(coordsKey(neighbor.coords), neighbor.coords);
      }
    }
    return [...destinations.values()];
  }

  return board.possibleSetMoveDestinations(color);
}

/**
 * Undeployed pieces worth trying: the bee alone once it is overdue,
 * otherwise one piece per distinct type.
 */
export function getSettablePieces(state: GameState, color: PlayerColor): Piece[] {
  const undeployed = state.undeployedPieces[color];
  const mustSetBee = getRound(state) >= BEE_DEADLINE_ROUND && !state.board.hasPlacedBee(color);

  const byType = new Map<string, Piece>();
  for (const piece of undeployed) {
    if (mustSetBee && piece.type !== 'BEE') continue;
    if (!byType.has(piece.type)) {
      byType.set(piece.type, piece);
    }
  }
  return [...byType.values()];
}

export function getPossibleSetMoves(state: GameState, color: PlayerColor): SetMove[] {
  const pieces = getSettablePieces(state, color);
  const moves: SetMove[] = [];
  for (const destination of getSetMoveDestinations(state, color)) {
    for (const piece of pieces) {
      moves.push({ type: 'set', piece: { ...piece }, destination });
    }
  }
  return moves;
}

// ═══════════════════════════════════════════════════════════════════════════
// DRAG MOVES
// ═══════════════════════════════════════════════════════════════════════════

export function getPossibleDragMoves(state: GameState, color: PlayerColor): DragMove[] {
  const { board } = state;
  if (!board.hasPlacedBee(color)) {
    return [];
  }

  const boundary = board.swarmBoundary().map(({ coords }) => coords);
  const moves: DragMove[] = [];

  for (const { coords: start, field } of board.fieldsOwnedBy(color)) {
    const targets = [...boundary];
    if (topPiece(field)?.type === 'BEETLE') {
      const seen = new Set(targets.map(coordsKey));
      for (const { coords } of board.neighbors(start)) {
        if (!seen.has(coordsKey(coords))) {
          targets.push(coords);
        }
      }
    }

    for (const destination of targets) {
      const move: DragMove = { type: 'drag', start, destination };
      if (validateDragMove(state, color, move).valid) {
        moves.push(move);
      }
    }
  }

  return moves;
}

// ═══════════════════════════════════════════════════════════════════════════
// ALL MOVES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Every legal move for `color`. When neither a set nor a drag move exists
 * the only legal move is a skip.
 */
export function getPossibleMoves(state: GameState, color: PlayerColor): Move[] {
  const moves: Move[] = [...getPossibleSetMoves(state, color), ...getPossibleDragMoves(state, color)];
  engineTraceLog('moveGeneration', `${moves.length} moves for ${color} at turn ${state.turn}`);
  return moves.length > 0 ? moves : [{ type: 'skip' }];
}
