import { Board } from '../../src/shared/engine/Board';
import { coordsKey } from '../../src/shared/engine/hexCoords';
import { BOARD_RADIUS, FIELD_COUNT, fieldCountForRadius } from '../../src/shared/engine/rulesConfig';
import { createTestBoard, obstruct, piece, place, pos } from '../utils/fixtures';

function keysOf(coords: Array<{ x: number; y: number }>): string[] {
  return coords.map(coordsKey).sort();
}

describe('Board', () => {
  describe('fillingRadius', () => {
    it('creates 91 fields for the standard radius', () => {
      expect(Board.fillingRadius(BOARD_RADIUS).size).toBe(FIELD_COUNT);
      expect(fieldCountForRadius(BOARD_RADIUS)).toBe(FIELD_COUNT);
    });

    it('creates the origin and its neighbors for radius 2', () => {
      const board = Board.fillingRadius(2);
      expect(keysOf(board.fields().map((f) => f.coords))).toEqual(
        ['0,0', '0,1', '1,0', '1,-1', '0,-1', '-1,0', '-1,1'].sort()
      );
    });

    it('keeps provided fields instead of overwriting them', () => {
      const board = createTestBoard(place(0, 0, 'RB'), obstruct(1, 0));
      expect(board.size).toBe(FIELD_COUNT);
      expect(board.field(pos(0, 0))?.pieces).toEqual([piece('RED', 'BEE')]);
      expect(board.field(pos(1, 0))?.isObstructed).toBe(true);
    });
  });

  describe('field queries', () => {
    it('treats off-board coordinates as occupied', () => {
      const board = createTestBoard();
      expect(board.contains(pos(6, 0))).toBe(false);
      expect(board.isOccupied(pos(6, 0))).toBe(true);
      expect(board.isOccupied(pos(5, 0))).toBe(false);
    });

    it('only reports neighbors that exist on the board', () => {
      const board = createTestBoard();
      expect(keysOf(board.neighbors(pos(5, 0)).map((f) => f.coords))).toEqual(
        ['5,-1', '4,0', '4,1'].sort()
      );
    });

    it('uses the top piece for ownership but finds buried bees', () => {
      const board = createTestBoard(place(0, 0, 'RB', 'BT'));
      expect(board.fieldsOwnedBy('RED')).toEqual([]);
      expect(board.fieldsOwnedBy('BLUE').map((f) => f.coords)).toEqual([pos(0, 0)]);
      expect(board.hasPlacedBee('RED')).toBe(true);
      expect(board.findBee('RED')).toEqual(pos(0, 0));
      expect(board.hasPlacedBee('BLUE')).toBe(false);
    });

    it('counts obstructed fields as occupied but not as pieces', () => {
      const board = createTestBoard(obstruct(2, 2));
      expect(board.occupiedFields()).toHaveLength(1);
      expect(board.hasPieces()).toBe(false);
      expect(board.emptyFields()).toHaveLength(FIELD_COUNT - 1);
    });
  });

  describe('neighborhood', () => {
    it('collects the swarm boundary without duplicates', () => {
      const single = createTestBoard(place(0, 0, 'RB'));
      expect(single.swarmBoundary()).toHaveLength(6);

      const pair = createTestBoard(place(0, 0, 'RB'), place(0, 1, 'BB'));
      expect(pair.swarmBoundary()).toHaveLength(8);
    });

    it('finds set destinations next to own pieces and away from the opponent', () => {
      const board = createTestBoard(place(0, 0, 'RB'), place(0, 2, 'BB'));
      expect(keysOf(board.possibleSetMoveDestinations('RED'))).toEqual(
        ['1,0', '1,-1', '0,-1', '-1,0', '-1,1'].sort()
      );
    });

    it('checks adjacency to colors and pieces', () => {
      const board = createTestBoard(place(0, 0, 'RB'));
      expect(board.isNextTo('RED', pos(1, 0))).toBe(true);
      expect(board.isNextTo('BLUE', pos(1, 0))).toBe(false);
      expect(board.isNextToPiece(pos(2, 0))).toBe(false);
    });
  });

  describe('movement along the swarm', () => {
    it('allows sliding when one shared neighbor holds pieces and the other is empty', () => {
      const board = createTestBoard(place(1, 0, 'BA'));
      expect(board.canMoveBetween(pos(0, 0), pos(0, 1))).toBe(true);
    });

    it('blocks sliding through a closed gate', () => {
      const board = createTestBoard(place(1, 0, 'BA'), place(-1, 1, 'BA'));
      expect(board.canMoveBetween(pos(0, 0), pos(0, 1))).toBe(false);
    });

    it('blocks sliding without contact to the swarm', () => {
      const board = createTestBoard();
      expect(board.canMoveBetween(pos(0, 0), pos(0, 1))).toBe(false);
    });

    it('walks the boundary around a pair of pieces', () => {
      const board = createTestBoard(place(0, 0, 'RB'), place(0, 1, 'BB'));
      expect(board.connectedByBoundaryPath(pos(0, -1), pos(0, 2))).toBe(true);
      expect(board.reachableInExactly(pos(0, -1), pos(1, 1), 3)).toBe(true);
      expect(board.reachableInExactly(pos(0, -1), pos(1, 0), 3)).toBe(false);
    });

    it('detects a disconnected swarm', () => {
      expect(createTestBoard().isSwarmConnected()).toBe(true);
      expect(createTestBoard(place(0, 0, 'RB'), place(0, 1, 'BB')).isSwarmConnected()).toBe(true);
      expect(createTestBoard(place(0, 0, 'RB'), place(0, 2, 'BB')).isSwarmConnected()).toBe(false);
    });
  });

  describe('copies', () => {
    it('returns modified copies and leaves the original untouched', () => {
      const board = createTestBoard(place(0, 0, 'RB'));
      const pushed = board.withPiecePushed(pos(0, 0), piece('BLUE', 'BEETLE'));
      const removed = board.withPieceRemoved(pos(0, 0));

      expect(board.field(pos(0, 0))?.pieces).toEqual([piece('RED', 'BEE')]);
      expect(pushed.field(pos(0, 0))?.pieces).toEqual([piece('RED', 'BEE'), piece('BLUE', 'BEETLE')]);
      expect(removed.field(pos(0, 0))?.pieces).toEqual([]);
    });

    it('shares unchanged fields and gives the changed one a new stack', () => {
      const board = createTestBoard(place(0, 0, 'RB'), place(1, 0, 'BB'));
      const original = board.field(pos(0, 0));
      const pushed = board.withPiecePushed(pos(0, 0), piece('BLUE', 'BEETLE'));

      expect(pushed.field(pos(1, 0))).toBe(board.field(pos(1, 0)));
      expect(pushed.field(pos(0, 0))).not.toBe(original);
      expect(original?.pieces).toEqual([piece('RED', 'BEE')]);
      expect(board.neighbors(pos(1, 0)).find((n) => n.coords.x === 0 && n.coords.y === 0)?.field).toBe(original);
    });

    it('leaves empty fields as they are when removing', () => {
      const board = createTestBoard(place(0, 0, 'RB'));
      expect(board.withPieceRemoved(pos(2, 0)).field(pos(2, 0))).toEqual({ pieces: [], isObstructed: false });
    });
  });

  describe('toString', () => {
    it('renders rows with padding outside the board', () => {
      const rows = Board.fillingRadius(4).toString().split('\n');
      expect(rows).toHaveLength(8);
      expect(rows[0]).toBe('000000[][][][]');
      expect(rows[1]).toBe('0000[][][][][]');
      expect(rows[3]).toBe('[][][][][][][]');
      expect(rows[6]).toBe('[][][][]000000');
      expect(rows[7]).toBe('');
    });

    it('renders the top piece of each field', () => {
      const board = Board.fillingRadius(2, [place(0, 0, 'RB', 'BT')]);
      expect(board.toString().split('\n')[1]).toBe('[]BT[]');
    });
  });
});
