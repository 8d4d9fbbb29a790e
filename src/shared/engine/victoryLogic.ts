import type { GameOutcome, GameState, PlayerColor } from '../types/game';
import type { Board } from './Board';
import { isEmptyField } from './field';
import { ROUND_LIMIT } from './rulesConfig';

/**
 * A bee is blocked once every neighbor on the board is occupied, either
 * by pieces or by an obstruction. An unplaced bee is never blocked.
 */
export function isBeeBlocked(board: Board, color: PlayerColor): boolean {
  const bee = board.findBee(color);
  if (!bee) {
    return false;
  }
  return board.neighbors(bee).every(({ field }) => !isEmptyField(field));
}

/** Empty on-board neighbors of `color`'s bee; 0 while the bee is unplaced. */
export function freeFieldsAroundBee(board: Board, color: PlayerColor): number {
  const bee = board.findBee(color);
  if (!bee) {
    return 0;
  }
  return board.emptyNeighbors(bee).length;
}

/**
 * Side-effect-free outcome check, evaluated after every move:
 *
 * 1. A blocked bee loses immediately; if both bees are blocked the game
 *    is drawn.
 * 2. After {@link ROUND_LIMIT} rounds the player with more free fields
 *    around their bee wins; equal counts draw.
 */
export function getGameOutcome(state: GameState): GameOutcome {
  const { board } = state;
  const redBlocked = isBeeBlocked(board, 'RED');
  const blueBlocked = isBeeBlocked(board, 'BLUE');

  if (redBlocked && blueBlocked) {
    return { isOver: true, winner: null, reason: 'both_bees_blocked' };
  }
  if (redBlocked) {
    return { isOver: true, winner: 'BLUE', reason: 'bee_blocked' };
  }
  if (blueBlocked) {
    return { isOver: true, winner: 'RED', reason: 'bee_blocked' };
  }

  if (state.turn >= 2 * ROUND_LIMIT) {
    const red = freeFieldsAroundBee(board, 'RED');
    const blue = freeFieldsAroundBee(board, 'BLUE');
    const winner = red === blue ? null : red > blue ? 'RED' : 'BLUE';
    return { isOver: true, winner, reason: 'round_limit' };
  }

  return { isOver: false };
}
