import type { GameState, Move, PlayerColor } from '../../shared/types/game';
import type { GameResult } from '../../shared/protocol';

/**
 * The player's behaviour. The client calls into the delegate whenever the
 * server asks for a move or reports progress; only `requestMove` is
 * required.
 */
export interface PlayerDelegate {
  /**
   * Pick a move for `myColor`. May be async; the client enforces the move
   * time budget and falls back to a random legal move when the result is
   * late, illegal or an error.
   */
  requestMove(state: GameState, myColor: PlayerColor): Move | Promise<Move>;

  onWelcome?(myColor: PlayerColor): void;

  onUpdateState?(state: GameState): void;

  onGameEnd?(result: GameResult): void;
}
