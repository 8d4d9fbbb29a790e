import type { Field, Move, Piece, PieceType, PlayerColor } from '../types/game';
import { NotationError } from './errors';
import { formatCoords } from './hexCoords';

/**
 * Compact notation for colors, pieces and fields.
 *
 * Fields are written as two characters: the owner's color followed by the
 * piece type, e.g. `RB` for a red bee or `BT` for a blue beetle. This is
 * what ASCII hex grids and board dumps use. Stacks and obstructed fields
 * have no notation; only the top piece is rendered.
 */

const COLOR_CHARS: Record<PlayerColor, string> = {
  RED: 'R',
  BLUE: 'B',
};

const PIECE_TYPE_CHARS: Record<PieceType, string> = {
  ANT: 'A',
  BEE: 'B',
  BEETLE: 'T',
  GRASSHOPPER: 'G',
  SPIDER: 'S',
};

const FIELD_SYNTAX = /^([A-Z])([A-Z])$/;

export function colorToChar(color: PlayerColor): string {
  return COLOR_CHARS[color];
}

export function pieceTypeToChar(type: PieceType): string {
  return PIECE_TYPE_CHARS[type];
}

export function colorFromChar(c: string): PlayerColor {
  switch (c.toUpperCase()) {
    case 'R':
      return 'RED';
    case 'B':
      return 'BLUE';
    default:
      throw new NotationError(`Did not recognize player color ${c}`, { char: c });
  }
}

export function pieceTypeFromChar(c: string): PieceType {
  switch (c.toUpperCase()) {
    case 'A':
      return 'ANT';
    case 'B':
      return 'BEE';
    case 'T':
      return 'BEETLE';
    case 'G':
      return 'GRASSHOPPER';
    case 'S':
      return 'SPIDER';
    default:
      throw new NotationError(`Did not recognize piece type ${c}`, { char: c });
  }
}

/**
 * Parse a field in two-character notation. The empty string denotes an
 * empty field.
 */
export function parseFieldNotation(raw: string): Field {
  if (raw.length === 0) {
    return { pieces: [], isObstructed: false };
  }

  const groups = FIELD_SYNTAX.exec(raw);
  if (!groups) {
    throw new NotationError(`${raw} does not match field syntax ${FIELD_SYNTAX.source}`, { raw });
  }

  const piece: Piece = {
    owner: colorFromChar(groups[1]),
    type: pieceTypeFromChar(groups[2]),
  };
  return { pieces: [piece], isObstructed: false };
}

/**
 * Render a field's top piece, or `[]` when it holds none.
 */
export function formatField(field: Field): string {
  const top = field.pieces[field.pieces.length - 1];
  if (!top) {
    return '[]';
  }
  return `${colorToChar(top.owner)}${pieceTypeToChar(top.type)}`;
}

export function formatPiece(piece: Piece): string {
  return `${piece.owner} ${piece.type}`;
}

/**
 * Human-readable move description for logs.
 */
export function formatMove(move: Move): string {
  switch (move.type) {
    case 'set':
      return `Set ${formatPiece(move.piece)} at ${formatCoords(move.destination)}`;
    case 'drag':
      return `Drag ${formatCoords(move.start)} -> ${formatCoords(move.destination)}`;
    case 'skip':
      return 'Skip';
  }
}
