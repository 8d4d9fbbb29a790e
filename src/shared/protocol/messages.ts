/**
 * Messages exchanged with the Software Challenge game server.
 *
 * The server wraps everything in a single `<protocol>` stream. Top-level
 * messages are `<joined>`, `<left>` and `<room>`; room messages carry a
 * polymorphic `<data class="...">` payload.
 */

import type { GameState, Move, Player, PlayerColor } from '../types/game';

// ============================================================================
// Scores & Results
// ============================================================================

export type ScoreAggregation = 'SUM' | 'AVERAGE';

export const SCORE_AGGREGATIONS: readonly ScoreAggregation[] = ['SUM', 'AVERAGE'];

export type ScoreCause =
  | 'REGULAR'
  | 'LEFT'
  | 'RULE_VIOLATION'
  | 'SOFT_TIMEOUT'
  | 'HARD_TIMEOUT'
  | 'UNKNOWN';

export const SCORE_CAUSES: readonly ScoreCause[] = [
  'REGULAR',
  'LEFT',
  'RULE_VIOLATION',
  'SOFT_TIMEOUT',
  'HARD_TIMEOUT',
  'UNKNOWN',
];

export interface ScoreFragment {
  name: string;
  aggregation: ScoreAggregation;
  relevantForRanking: boolean;
}

/** Describes the parts of every {@link PlayerScore}, in order. */
export interface ScoreDefinition {
  fragments: ScoreFragment[];
}

export interface PlayerScore {
  cause: ScoreCause;
  /** Empty when the server gives no reason. */
  reason: string;
  parts: number[];
}

export interface GameResult {
  definition: ScoreDefinition;
  scores: PlayerScore[];
  winners: Player[];
}

// ============================================================================
// Room Data
// ============================================================================

export const DATA_CLASSES = {
  welcomeMessage: 'welcomeMessage',
  memento: 'memento',
  moveRequest: 'sc.framework.plugins.protocol.MoveRequest',
  result: 'result',
  error: 'error',
  setMove: 'setmove',
  dragMove: 'dragmove',
  skipMove: 'skipmove',
} as const;

export type Data =
  | { kind: 'welcomeMessage'; color: PlayerColor }
  | { kind: 'memento'; state: GameState }
  | { kind: 'moveRequest' }
  | { kind: 'result'; result: GameResult }
  | { kind: 'error'; message: string }
  | { kind: 'move'; move: Move };

// ============================================================================
// Top-level Messages
// ============================================================================

export interface JoinedMessage {
  kind: 'joined';
  roomId: string;
}

export interface LeftMessage {
  kind: 'left';
  roomId: string;
}

export interface RoomMessage {
  kind: 'room';
  roomId: string;
  data: Data;
}

export type ServerMessage = JoinedMessage | LeftMessage | RoomMessage;
