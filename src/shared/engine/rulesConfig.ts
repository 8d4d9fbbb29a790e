import type { PieceType } from '../types/game';

/**
 * Fixed parameters of the 2020 Hive ruleset.
 */

/** Game type identifier used when joining a game without a reservation. */
export const GAME_TYPE = 'swc_2020_hive';

/** A game ends after this many rounds (two turns per round). */
export const ROUND_LIMIT = 30;

/** Side length of the hexagonal board, counted in fields including the center. */
export const BOARD_RADIUS = 6;

/** 1 + 6 + 12 + 18 + 24 + 30 */
export const FIELD_COUNT = 91;

/** A spider moves exactly this many steps along the swarm. */
export const SPIDER_STEPS = 3;

/** The bee must be on the board by this round at the latest (0-based). */
export const BEE_DEADLINE_ROUND = 3;

/** Pieces each player starts with, off the board. */
export const INITIAL_PIECE_TYPES: readonly PieceType[] = [
  'BEE',
  'SPIDER',
  'SPIDER',
  'SPIDER',
  'GRASSHOPPER',
  'GRASSHOPPER',
  'BEETLE',
  'BEETLE',
  'ANT',
  'ANT',
  'ANT',
];

/**
 * Number of fields on a hexagonal board with the given radius.
 */
export function fieldCountForRadius(radius: number): number {
  if (radius <= 0) return 0;
  return 1 + 3 * radius * (radius - 1);
}
