/**
 * Test Fixtures and Utilities
 * Common builders for boards, states and moves used across the unit tests.
 */

import type {
  AxialCoords,
  ColorRecord,
  DragMove,
  GameState,
  Piece,
  PieceType,
  PlayerColor,
  PositionedField,
  SetMove,
} from '../../src/shared/types/game';
import { piecesEqual } from '../../src/shared/types/game';
import { Board } from '../../src/shared/engine/Board';
import { obstructedField } from '../../src/shared/engine/field';
import { parseFieldNotation } from '../../src/shared/engine/notation';
import { BOARD_RADIUS, INITIAL_PIECE_TYPES } from '../../src/shared/engine/rulesConfig';

/**
 * Axial position helper
 */
export function pos(x: number, y: number): AxialCoords {
  return { x, y };
}

export function piece(owner: PlayerColor, type: PieceType): Piece {
  return { owner, type };
}

/**
 * A field holding a stack in two-character notation, bottom first:
 * `place(0, 0, 'RB', 'BT')` is a blue beetle on top of a red bee.
 */
export function place(x: number, y: number, ...stack: string[]): PositionedField {
  return {
    coords: pos(x, y),
    field: {
      pieces: stack.flatMap((notation) => parseFieldNotation(notation).pieces),
      isObstructed: false,
    },
  };
}

export function obstruct(x: number, y: number): PositionedField {
  return { coords: pos(x, y), field: obstructedField() };
}

/**
 * Creates a standard radius-6 board holding the given fields.
 */
export function createTestBoard(...fields: PositionedField[]): Board {
  return Board.fillingRadius(BOARD_RADIUS, fields);
}

/**
 * The starting set of `color` minus the pieces already on `board`.
 */
export function undeployedFor(board: Board, color: PlayerColor): Piece[] {
  const remaining: Piece[] = INITIAL_PIECE_TYPES.map((type) => ({ owner: color, type }));
  for (const { field } of board.fields()) {
    for (const p of field.pieces) {
      if (p.owner !== color) continue;
      const index = remaining.findIndex((r) => piecesEqual(r, p));
      if (index >= 0) {
        remaining.splice(index, 1);
      }
    }
  }
  return remaining;
}

export interface TestStateOptions {
  turn?: number;
  currentPlayerColor?: PlayerColor;
  undeployed?: Partial<ColorRecord<Piece[]>>;
}

/**
 * Creates a GameState around `board`. RED starts, so the player to move
 * follows from the turn unless given; undeployed pieces default to
 * whatever the board leaves over.
 */
export function createTestState(board: Board, options: TestStateOptions = {}): GameState {
  const turn = options.turn ?? 0;
  return {
    turn,
    startPlayerColor: 'RED',
    currentPlayerColor: options.currentPlayerColor ?? (turn % 2 === 0 ? 'RED' : 'BLUE'),
    board,
    players: {
      RED: { color: 'RED', displayName: 'Red Player' },
      BLUE: { color: 'BLUE', displayName: 'Blue Player' },
    },
    undeployedPieces: {
      RED: options.undeployed?.RED ?? undeployedFor(board, 'RED'),
      BLUE: options.undeployed?.BLUE ?? undeployedFor(board, 'BLUE'),
    },
  };
}

export function setMove(owner: PlayerColor, type: PieceType, x: number, y: number): SetMove {
  return { type: 'set', piece: piece(owner, type), destination: pos(x, y) };
}

export function dragMove(fromX: number, fromY: number, toX: number, toY: number): DragMove {
  return { type: 'drag', start: pos(fromX, fromY), destination: pos(toX, toY) };
}
