import type { GameState, Move, PlayerColor } from '../../shared/types/game';
import {
  chooseRandomMove,
  createDefaultRng,
  formatMove,
  getPossibleMoves,
  LocalAIRng,
} from '../../shared/engine';
import { ClientErrorCode, MoveSelectionError } from '../../shared/errors';
import { logger } from '../utils/logger';
import type { PlayerDelegate } from './PlayerDelegate';

/**
 * Default player: picks a uniformly random legal move. Replace the body of
 * `requestMove` with a real strategy.
 */
export class OwnGameLogic implements PlayerDelegate {
  constructor(private readonly rng: LocalAIRng = createDefaultRng()) {}

  requestMove(state: GameState, myColor: PlayerColor): Move {
    const moves = getPossibleMoves(state, myColor);
    const move = chooseRandomMove(moves, this.rng);
    if (!move) {
      throw new MoveSelectionError(ClientErrorCode.MOVE_NO_LEGAL_MOVE, 'No move found', {
        turn: state.turn,
        color: myColor,
      });
    }
    logger.info(`Chose ${formatMove(move)} from ${moves.length} moves`);
    return move;
  }

  onUpdateState(state: GameState): void {
    logger.debug(`New board:\n${state.board.toString()}`, { turn: state.turn });
  }
}
