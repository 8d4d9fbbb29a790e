/**
 * Core data model for the Hive game played in the Software Challenge.
 *
 * Everything here is plain data: boards, states and moves are passed
 * between the engine, the XML protocol layer and the client without
 * carrying behaviour. Geometry lives in `engine/hexCoords.ts`, rules in
 * the rest of `engine/`.
 */

import type { Board } from '../engine/Board';

// ============================================================================
// Colors & Pieces
// ============================================================================

export type PlayerColor = 'RED' | 'BLUE';

export const PLAYER_COLORS: readonly PlayerColor[] = ['RED', 'BLUE'];

export type PieceType = 'ANT' | 'BEE' | 'BEETLE' | 'GRASSHOPPER' | 'SPIDER';

export const PIECE_TYPES: readonly PieceType[] = ['ANT', 'BEE', 'BEETLE', 'GRASSHOPPER', 'SPIDER'];

export interface Piece {
  readonly owner: PlayerColor;
  readonly type: PieceType;
}

export function opponentOf(color: PlayerColor): PlayerColor {
  return color === 'RED' ? 'BLUE' : 'RED';
}

export function isPlayerColor(value: string): value is PlayerColor {
  return PLAYER_COLORS.some((color) => color === value);
}

export function isPieceType(value: string): value is PieceType {
  return PIECE_TYPES.some((type) => type === value);
}

export function piecesEqual(a: Piece, b: Piece): boolean {
  return a.owner === b.owner && a.type === b.type;
}

// ============================================================================
// Coordinates
// ============================================================================

/**
 * Axial coordinates on the hex grid, origin at the board center.
 * See https://www.redblobgames.com/grids/hexagons/#coordinates-axial
 */
export interface AxialCoords {
  readonly x: number;
  readonly y: number;
}

/**
 * Cube coordinates (x + y + z = 0). The protocol transmits positions in
 * this form.
 */
export interface CubeCoords {
  x: number;
  y: number;
  z: number;
}

/**
 * Doubled offset coordinates, used for ASCII hex grids:
 *
 * ```
 * +--> x
 * |
 * v y
 * ```
 */
export interface DoubledCoords {
  x: number;
  y: number;
}

// ============================================================================
// Fields
// ============================================================================

/**
 * A single board field. Fields do not store their position;
 * pair it with coordinates via {@link PositionedField} when needed.
 * Fields are immutable: boards hand out their own instances.
 */
export interface Field {
  /** Piece stack ordered bottom → top. */
  readonly pieces: readonly Piece[];
  readonly isObstructed: boolean;
}

export interface PositionedField {
  readonly coords: AxialCoords;
  readonly field: Field;
}

// ============================================================================
// Players
// ============================================================================

export interface Player {
  color: PlayerColor;
  displayName: string;
}

// ============================================================================
// Moves
// ============================================================================

export type MoveType = 'set' | 'drag' | 'skip';

/** Places an undeployed piece on the board. */
export interface SetMove {
  type: 'set';
  piece: Piece;
  destination: AxialCoords;
}

/** Moves the top piece of a field to another field. */
export interface DragMove {
  type: 'drag';
  start: AxialCoords;
  destination: AxialCoords;
}

/** Passes the turn; only legal when nothing else is. */
export interface SkipMove {
  type: 'skip';
}

export type Move = SetMove | DragMove | SkipMove;

// ============================================================================
// Game State
// ============================================================================

export type ColorRecord<T> = Record<PlayerColor, T>;

/**
 * Snapshot of a game at a specific turn. `turn` counts single moves, so a
 * round consists of two turns.
 */
export interface GameState {
  turn: number;
  startPlayerColor: PlayerColor;
  currentPlayerColor: PlayerColor;
  board: Board;
  players: ColorRecord<Player>;
  undeployedPieces: ColorRecord<Piece[]>;
  lastMove?: Move;
}

export type GameOutcome =
  | { isOver: false }
  | { isOver: true; winner: PlayerColor | null; reason: GameEndReason };

export type GameEndReason = 'bee_blocked' | 'both_bees_blocked' | 'round_limit';
