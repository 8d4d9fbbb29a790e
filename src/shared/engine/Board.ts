import type { AxialCoords, Field, Piece, PlayerColor, PositionedField } from '../types/game';
import { opponentOf } from '../types/game';
import {
  emptyField,
  hasPieces,
  isEmptyField,
  isOccupied,
  isOwnedBy,
} from './field';
import { axialNeighbors, coordsEqual, coordsKey } from './hexCoords';
import { formatField } from './notation';

/**
 * The Hive game board: a hexagonal grid of fields keyed by axial
 * coordinates with the origin at the center.
 *
 * Boards are treated as values by the rules. Queries never mutate; the
 * `with*` methods return modified copies.
 */
export class Board {
  private readonly cells: Map<string, PositionedField>;

  constructor(fields: Iterable<PositionedField> = []) {
    this.cells = new Map();
    for (const { coords, field } of fields) {
      this.cells.set(coordsKey(coords), { coords: { ...coords }, field });
    }
  }

  /**
   * Creates a hexagonal board of the given radius. Besides the provided
   * fields, every coordinate with |x|, |y|, |x + y| < radius is filled with
   * an empty field.
   */
  static fillingRadius(radius: number, fields: Iterable<PositionedField> = []): Board {
    const board = new Board(fields);
    const inner = radius - 1;

    for (let y = -inner; y <= inner; y++) {
      const minX = Math.max(-inner - y, -inner);
      const maxX = Math.min(inner - y, inner);
      for (let x = minX; x <= maxX; x++) {
        const key = coordsKey({ x, y });
        if (!board.cells.has(key)) {
          board.cells.set(key, { coords: { x, y }, field: emptyField() });
        }
      }
    }

    return board;
  }

  // ==========================================================================
  // Field access
  // ==========================================================================

  field(coords: AxialCoords): Field | undefined {
    return this.cells.get(coordsKey(coords))?.field;
  }

  contains(coords: AxialCoords): boolean {
    return this.cells.has(coordsKey(coords));
  }

  /** Off-board coordinates count as occupied. */
  isOccupied(coords: AxialCoords): boolean {
    const field = this.field(coords);
    return field ? isOccupied(field) : true;
  }

  get size(): number {
    return this.cells.size;
  }

  fields(): PositionedField[] {
    return [...this.cells.values()];
  }

  fieldsOwnedBy(color: PlayerColor): PositionedField[] {
    return this.fields().filter(({ field }) => isOwnedBy(field, color));
  }

  emptyFields(): PositionedField[] {
    return this.fields().filter(({ field }) => isEmptyField(field));
  }

  occupiedFields(): PositionedField[] {
    return this.fields().filter(({ field }) => isOccupied(field));
  }

  hasPieces(): boolean {
    return this.fields().some(({ field }) => hasPieces(field));
  }

  // ==========================================================================
  // Neighborhood
  // ==========================================================================

  /** Neighbors that exist on this board. */
  neighbors(coords: AxialCoords): PositionedField[] {
    const result: PositionedField[] = [];
    for (const neighbor of axialNeighbors(coords)) {
      const cell = this.cells.get(coordsKey(neighbor));
      if (cell) {
        result.push(cell);
      }
    }
    return result;
  }

  emptyNeighbors(coords: AxialCoords): PositionedField[] {
    return this.neighbors(coords).filter(({ field }) => isEmptyField(field));
  }

  hasPlacedBee(color: PlayerColor): boolean {
    return this.fields().some(({ field }) =>
      field.pieces.some((piece) => piece.type === 'BEE' && piece.owner === color)
    );
  }

  findBee(color: PlayerColor): AxialCoords | undefined {
    const cell = this.fields().find(({ field }) =>
      field.pieces.some((piece) => piece.type === 'BEE' && piece.owner === color)
    );
    return cell?.coords;
  }

  /** Whether a neighbor of `coords` is owned by `color`. */
  isNextTo(color: PlayerColor, coords: AxialCoords): boolean {
    return this.neighbors(coords).some(({ field }) => isOwnedBy(field, color));
  }

  isNextToPiece(coords: AxialCoords): boolean {
    return this.neighbors(coords).some(({ field }) => hasPieces(field));
  }

  /**
   * Empty fields adjacent to the swarm (the fields holding pieces), without
   * duplicates.
   */
  swarmBoundary(): PositionedField[] {
    const boundary = new Map<string, PositionedField>();
    for (const { coords, field } of this.fields()) {
      if (!hasPieces(field)) continue;
      for (const neighbor of this.emptyNeighbors(coords)) {
        boundary.set(coordsKey(neighbor.coords), neighbor);
      }
    }
    return [...boundary.values()];
  }

  /**
   * Empty fields next to one of `color`'s fields that do not touch an
   * opponent's field.
   */
  possibleSetMoveDestinations(color: PlayerColor): AxialCoords[] {
    const opponent = opponentOf(color);
    const destinations = new Map<string, AxialCoords>();

    for (const { coords } of this.fieldsOwnedBy(color)) {
      for (const neighbor of this.emptyNeighbors(coords)) {
        if (!this.isNextTo(opponent, neighbor.coords)) {
          destinations.set(coordsKey(neighbor.coords), neighbor.coords);
        }
      }
    }

    return [...destinations.values()];
  }

  // ==========================================================================
  // Movement along the swarm
  // ==========================================================================

  /** On-board fields adjacent to both `a` and `b`. */
  sharedNeighbors(a: AxialCoords, b: AxialCoords): PositionedField[] {
    const bKeys = new Set(this.neighbors(b).map(({ coords }) => coordsKey(coords)));
    return this.neighbors(a).filter(({ coords }) => bKeys.has(coordsKey(coords)));
  }

  /**
   * Whether a piece can slide from `a` to the adjacent `b`: the gap between
   * the two shared neighbors must be open and the piece must keep contact
   * with the swarm while sliding.
   */
  canMoveBetween(a: AxialCoords, b: AxialCoords): boolean {
    const shared = this.sharedNeighbors(a, b);
    const gateOpen = shared.length === 1 || shared.some(({ field }) => isEmptyField(field));
    const keepsContact = shared.some(({ field }) => hasPieces(field));
    return gateOpen && keepsContact;
  }

  accessibleNeighbors(coords: AxialCoords): PositionedField[] {
    return this.neighbors(coords).filter(
      (neighbor) => isEmptyField(neighbor.field) && this.canMoveBetween(coords, neighbor.coords)
    );
  }

  /**
   * Breadth-first search along accessible fields from `start` to
   * `destination`.
   */
  connectedByBoundaryPath(start: AxialCoords, destination: AxialCoords): boolean {
    const visited = new Set<string>([coordsKey(start)]);
    const queue: AxialCoords[] = [start];

    while (queue.length > 0) {
      const current = queue.shift();
      if (!current) break;

      for (const { coords } of this.accessibleNeighbors(current)) {
        if (coordsEqual(coords, destination)) {
          return true;
        }
        const key = coordsKey(coords);
        if (!visited.has(key)) {
          visited.add(key);
          queue.push(coords);
        }
      }
    }

    return false;
  }

  /**
   * Whether `destination` is the end of a path of exactly `steps` accessible
   * moves from `start` that never revisits a field.
   */
  reachableInExactly(start: AxialCoords, destination: AxialCoords, steps: number): boolean {
    const walk = (current: AxialCoords, remaining: number, visited: Set<string>): boolean => {
      if (remaining === 0) {
        return coordsEqual(current, destination);
      }
      for (const { coords } of this.accessibleNeighbors(current)) {
        const key = coordsKey(coords);
        if (visited.has(key)) continue;
        visited.add(key);
        const found = walk(coords, remaining - 1, visited);
        visited.delete(key);
        if (found) return true;
      }
      return false;
    };

    return walk(start, steps, new Set([coordsKey(start)]));
  }

  /**
   * Depth-first search over the fields holding pieces. An empty swarm
   * counts as connected.
   */
  isSwarmConnected(): boolean {
    const unvisited = new Set(
      this.fields()
        .filter(({ field }) => hasPieces(field))
        .map(({ coords }) => coordsKey(coords))
    );

    const first = unvisited.values().next();
    if (first.done) {
      return true;
    }

    const stack: string[] = [first.value];
    unvisited.delete(first.value);
    while (stack.length > 0) {
      const key = stack.pop();
      const cell = key === undefined ? undefined : this.cells.get(key);
      if (!cell) continue;
      for (const neighbor of this.neighbors(cell.coords)) {
        const neighborKey = coordsKey(neighbor.coords);
        if (unvisited.has(neighborKey)) {
          unvisited.delete(neighborKey);
          stack.push(neighborKey);
        }
      }
    }

    return unvisited.size === 0;
  }

  // ==========================================================================
  // Copies
  // ==========================================================================

  /** Copy with the top piece at `coords` removed (no-op for empty fields). */
  withPieceRemoved(coords: AxialCoords): Board {
    return this.withFieldUpdated(coords, (field) => ({
      ...field,
      pieces: field.pieces.slice(0, -1),
    }));
  }

  /** Copy with `piece` pushed on top of the stack at `coords`. */
  withPiecePushed(coords: AxialCoords, piece: Piece): Board {
    return this.withFieldUpdated(coords, (field) => ({
      ...field,
      pieces: [...field.pieces, { ...piece }],
    }));
  }

  /** Unchanged fields are shared with the copy. */
  private withFieldUpdated(coords: AxialCoords, update: (field: Field) => Field): Board {
    const key = coordsKey(coords);
    return new Board(
      this.fields().map((entry) =>
        coordsKey(entry.coords) === key ? { coords: entry.coords, field: update(entry.field) } : entry
      )
    );
  }

  // ==========================================================================
  // Display
  // ==========================================================================

  /**
   * Renders the board row by row; positions outside the board are shown
   * as `00`.
   */
  toString(): string {
    const coords = this.fields().map((cell) => cell.coords);
    if (coords.length === 0) {
      return '';
    }

    const minX = Math.min(...coords.map((c) => c.x));
    const maxX = Math.max(...coords.map((c) => c.x));
    const minY = Math.min(...coords.map((c) => c.y));
    const maxY = Math.max(...coords.map((c) => c.y));

    let out = '';
    for (let y = minY; y <= maxY; y++) {
      for (let x = minX; x <= maxX; x++) {
        const field = this.field({ x: -y, y: -x });
        out += field ? formatField(field) : '00';
      }
      out += '\n';
    }
    return out;
  }
}
