import type {
  AxialCoords,
  ColorRecord,
  GameState,
  Piece,
  Player,
  PlayerColor,
  PositionedField,
} from '../types/game';
import { Board } from './Board';
import { obstructedField } from './field';
import { BOARD_RADIUS, INITIAL_PIECE_TYPES } from './rulesConfig';

export interface InitialGameStateOptions {
  startPlayerColor?: PlayerColor;
  /** Display names; default to the color name. */
  displayNames?: Partial<ColorRecord<string>>;
  /** Coordinates of obstructed fields on the fresh board. */
  obstructed?: AxialCoords[];
}

export function createUndeployedPieces(owner: PlayerColor): Piece[] {
  return INITIAL_PIECE_TYPES.map((type) => ({ owner, type }));
}

/**
 * Creates a fresh game: a radius-6 board, no pieces placed and each
 * player holding the full starting set.
 */
export function createInitialGameState(options: InitialGameStateOptions = {}): GameState {
  const startPlayerColor = options.startPlayerColor ?? 'RED';
  const obstructed: PositionedField[] = (options.obstructed ?? []).map((coords) => ({
    coords,
    field: obstructedField(),
  }));

  const player = (color: PlayerColor): Player => ({
    color,
    displayName: options.displayNames?.[color] ?? color,
  });

  return {
    turn: 0,
    startPlayerColor,
    currentPlayerColor: startPlayerColor,
    board: Board.fillingRadius(BOARD_RADIUS, obstructed),
    players: { RED: player('RED'), BLUE: player('BLUE') },
    undeployedPieces: {
      RED: createUndeployedPieces('RED'),
      BLUE: createUndeployedPieces('BLUE'),
    },
  };
}

/** A round consists of one move by each player. */
export function getRound(state: GameState): number {
  return Math.floor(state.turn / 2);
}

export function hasPlacedNothing(state: GameState, color: PlayerColor): boolean {
  return state.undeployedPieces[color].length === INITIAL_PIECE_TYPES.length;
}
