// =============================================================================
// HIVE RULES ENGINE - PUBLIC API
// =============================================================================
// The client, the protocol layer and player logic import the engine through
// this file only.
//
// - PURE: No side effects; state passed in and returned out
// - TYPE-SAFE: All inputs/outputs have explicit TypeScript types
// =============================================================================

// =============================================================================
// CORE TYPES (from src/shared/types/game.ts)
// =============================================================================

export type {
  PlayerColor,
  PieceType,
  Piece,
  AxialCoords,
  CubeCoords,
  DoubledCoords,
  Field,
  PositionedField,
  Player,
  Move,
  MoveType,
  SetMove,
  DragMove,
  SkipMove,
  ColorRecord,
  GameState,
  GameOutcome,
  GameEndReason,
} from '../types/game';
export { PLAYER_COLORS, PIECE_TYPES, opponentOf, isPlayerColor, isPieceType } from '../types/game';

// =============================================================================
// BOARD & GEOMETRY
// =============================================================================

export { Board } from './Board';
export { parseAsciiHexGrid } from './asciiHexGrid';
export * from './hexCoords';
export * from './field';
export {
  parseFieldNotation,
  formatField,
  formatPiece,
  formatMove,
  colorFromChar,
  pieceTypeFromChar,
  colorToChar,
  pieceTypeToChar,
} from './notation';
export * from './rulesConfig';

// =============================================================================
// STATE, VALIDATION & APPLICATION
// =============================================================================

export type { InitialGameStateOptions } from './initialState';
export {
  createInitialGameState,
  createUndeployedPieces,
  getRound,
  hasPlacedNothing,
} from './initialState';

export type { ValidationResult } from './types';
export { ValidationErrorCode } from './types';
export { validateSetMove } from './validators/SetMoveValidator';
export { validateDragMove, canPieceTypeReach } from './validators/DragMoveValidator';
export { validateMove, validateSkipMove } from './moveValidation';

export {
  getPossibleMoves,
  getPossibleSetMoves,
  getPossibleDragMoves,
  getSetMoveDestinations,
  getSettablePieces,
} from './moveGeneration';

export { applyMove } from './moveApplication';
export { isBeeBlocked, freeFieldsAroundBee, getGameOutcome } from './victoryLogic';

// =============================================================================
// MOVE SELECTION
// =============================================================================

export type { LocalAIRng } from './localAIMoveSelection';
export { chooseRandomMove, createSeededRng, createDefaultRng } from './localAIMoveSelection';

// =============================================================================
// ERRORS
// =============================================================================

export {
  EngineErrorCode,
  EngineError,
  RulesViolation,
  InvalidState,
  NotationError,
  isEngineError,
} from './errors';
export type { EngineErrorJSON } from './errors';
