import type { Field, Piece, PlayerColor } from '../types/game';

/**
 * Read-only helpers over {@link Field}. A field is occupied when it is
 * obstructed or holds at least one piece; only the top piece determines
 * ownership.
 */

export function emptyField(): Field {
  return { pieces: [], isObstructed: false };
}

export function obstructedField(): Field {
  return { pieces: [], isObstructed: true };
}

export function topPiece(field: Field): Piece | undefined {
  return field.pieces[field.pieces.length - 1];
}

export function fieldOwner(field: Field): PlayerColor | undefined {
  return topPiece(field)?.owner;
}

export function isOwnedBy(field: Field, color: PlayerColor): boolean {
  return fieldOwner(field) === color;
}

export function hasPieces(field: Field): boolean {
  return field.pieces.length > 0;
}

export function isOccupied(field: Field): boolean {
  return field.isObstructed || hasPieces(field);
}

export function isEmptyField(field: Field): boolean {
  return !isOccupied(field);
}
