/**
 * SC Client - drives one game against the Software Challenge server.
 *
 * Joins a game, keeps the latest game state, asks the {@link PlayerDelegate}
 * for moves and reports the result. The move time budget is enforced here:
 * when the delegate is late, throws, or proposes an illegal move, a random
 * legal move is sent instead so the player is never disqualified for a
 * timeout or rule violation.
 */

import type { GameState, Move, PlayerColor } from '../../shared/types/game';
import {
  createDefaultRng,
  formatMove,
  getPossibleMoves,
  LocalAIRng,
  validateMove,
} from '../../shared/engine';
import {
  createEmptyDiagnostics,
  CumulativeFallbackDiagnostics,
  FallbackReason,
  selectFallbackMove,
  updateDiagnostics,
} from '../../shared/ai/AIFallbackHandler';
import {
  ClientError,
  ClientErrorCode,
  isClientError,
  isFatalError,
  MoveSelectionError,
  ServerReportedError,
  wrapError,
} from '../../shared/errors';
import {
  decodeServerMessage,
  encodeJoin,
  encodeJoinPrepared,
  encodeRoom,
  Data,
  GameResult,
  ServerMessage,
  XmlNode,
} from '../../shared/protocol';
import {
  ClientSessionState,
  FinishReason,
  initialSession,
  isFinished,
  markFinished,
  markJoined,
  markJoining,
  markWelcomed,
  withGameState,
} from '../../shared/stateMachines/clientSession';
import { runWithTimeout } from '../../shared/utils/timeout';
import type { GameServerConnection } from '../services/GameServerConnection';
import { logger } from '../utils/logger';
import type { PlayerDelegate } from './PlayerDelegate';

export interface SCClientOptions {
  /** Joins the prepared game when set, otherwise any game of `gameType`. */
  reservation?: string | undefined;
  gameType: string;
  /** Budget for `PlayerDelegate.requestMove`. */
  moveTimeoutMs: number;
  /** RNG for fallback moves. */
  rng?: LocalAIRng;
}

export class SCClient {
  private session: ClientSessionState = initialSession();
  private result: GameResult | undefined;
  private fallbackDiagnostics: CumulativeFallbackDiagnostics = createEmptyDiagnostics();
  private readonly rng: LocalAIRng;
  private settle: {
    resolve: (result: GameResult | undefined) => void;
    reject: (error: ClientError) => void;
  } | null = null;

  constructor(
    private readonly connection: GameServerConnection,
    private readonly delegate: PlayerDelegate,
    private readonly options: SCClientOptions
  ) {
    this.rng = options.rng ?? createDefaultRng();
  }

  get sessionState(): ClientSessionState {
    return this.session;
  }

  get fallbacks(): CumulativeFallbackDiagnostics {
    return this.fallbackDiagnostics;
  }

  /**
   * Joins and plays until the session finishes. Resolves with the game
   * result, or undefined when the server never sent one; rejects on
   * connection and protocol failures.
   */
  run(): Promise<GameResult | undefined> {
    return new Promise((resolve, reject) => {
      this.settle = { resolve, reject };

      this.connection.on('message', (node) => this.handleNode(node));
      this.connection.on('end', () => this.finish('stream_end'));
      this.connection.on('close', () => this.finish('stream_end'));
      this.connection.on('error', (error) => this.fail(error));

      this.connection.open();
      this.join();
    });
  }

  // ==========================================================================
  // Joining
  // ==========================================================================

  private join(): void {
    const { reservation, gameType } = this.options;
    if (reservation) {
      logger.info('Joining prepared game', { reservation });
      this.transition(markJoining(true));
      this.connection.send(encodeJoinPrepared(reservation));
    } else {
      logger.info('Joining game', { gameType });
      this.transition(markJoining(false));
      this.connection.send(encodeJoin(gameType));
    }
  }

  // ==========================================================================
  // Incoming messages
  // ==========================================================================

  private handleNode(node: XmlNode): void {
    if (isFinished(this.session)) {
      logger.debug('Ignoring message after the session finished', { node: node.name });
      return;
    }

    let message: ServerMessage;
    try {
      message = decodeServerMessage(node);
    } catch (error) {
      if (isClientError(error) && error.code === ClientErrorCode.PROTOCOL_UNEXPECTED_MESSAGE) {
        logger.warn('Ignoring unexpected message', { error: error.message, node: node.name });
        return;
      }
      this.fail(wrapError(error, { node: node.name }));
      return;
    }

    switch (message.kind) {
      case 'joined':
        logger.info('Joined room', { roomId: message.roomId });
        this.transition(markJoined(message.roomId));
        break;
      case 'left':
        logger.info('Left room', { roomId: message.roomId });
        this.finish('left');
        break;
      case 'room':
        this.handleData(message.roomId, message.data);
        break;
    }
  }

  private handleData(roomId: string, data: Data): void {
    switch (data.kind) {
      case 'welcomeMessage':
        logger.info('Received welcome message', { roomId, color: data.color });
        this.transition(markWelcomed(this.session, roomId, data.color));
        this.notifyDelegate('onWelcome', () => this.delegate.onWelcome?.(data.color));
        break;
      case 'memento':
        logger.debug('Received game state', { roomId, turn: data.state.turn });
        this.transition(withGameState(this.session, data.state));
        this.notifyDelegate('onUpdateState', () => this.delegate.onUpdateState?.(data.state));
        break;
      case 'moveRequest':
        this.handleMoveRequest(roomId).catch((error: unknown) => this.fail(wrapError(error)));
        break;
      case 'result':
        this.result = data.result;
        logger.info('Received game result', {
          roomId,
          winners: data.result.winners.map((w) => `${w.displayName} (${w.color})`),
          scores: data.result.scores,
        });
        this.notifyDelegate('onGameEnd', () => this.delegate.onGameEnd?.(data.result));
        break;
      case 'error': {
        const error = new ServerReportedError(data.message, { roomId });
        logger.error(error.message, { roomId, code: error.code });
        break;
      }
      case 'move':
        logger.debug('Received move', { roomId, move: formatMove(data.move) });
        break;
    }
  }

  /**
   * Hooks run while the XML reader is inside a chunk; a throwing hook must
   * not unwind through the parser.
   */
  private notifyDelegate(hook: string, notify: () => void): void {
    try {
      notify();
    } catch (error) {
      this.fail(wrapError(error, { hook }));
    }
  }

  // ==========================================================================
  // Moves
  // ==========================================================================

  private async handleMoveRequest(roomId: string): Promise<void> {
    const session = this.session;
    if (session.kind !== 'playing' || !session.state) {
      throw new MoveSelectionError(
        ClientErrorCode.MOVE_SELECTION_FAILED,
        'Move requested before a game state was received',
        { roomId, session: session.kind }
      );
    }

    const move = await this.selectMove(session.state, session.myColor);
    if (isFinished(this.session)) {
      return;
    }
    logger.info('Sending move', { roomId, move: formatMove(move), turn: session.state.turn });
    this.connection.send(encodeRoom(roomId, { kind: 'move', move }));
  }

  private async selectMove(state: GameState, myColor: PlayerColor): Promise<Move> {
    const { moveTimeoutMs } = this.options;
    try {
      const outcome = await runWithTimeout(
        async () => this.delegate.requestMove(state, myColor),
        { timeoutMs: moveTimeoutMs }
      );
      if (outcome.kind === 'timeout') {
        logger.warn('Move computation timed out', { timeoutMs: moveTimeoutMs });
        return this.fallbackMove(state, myColor, 'move_timeout');
      }

      const validation = validateMove(state, myColor, outcome.value);
      if (!validation.valid) {
        logger.warn('Delegate chose an invalid move', {
          move: formatMove(outcome.value),
          reason: validation.reason,
          code: validation.code,
        });
        return this.fallbackMove(state, myColor, 'invalid_move');
      }

      logger.debug('Move computed', { durationMs: outcome.durationMs });
      return outcome.value;
    } catch (error) {
      logger.error('Move computation failed', { error });
      return this.fallbackMove(state, myColor, 'delegate_error');
    }
  }

  private fallbackMove(state: GameState, myColor: PlayerColor, reason: FallbackReason): Move {
    const result = selectFallbackMove({
      reason,
      color: myColor,
      validMoves: getPossibleMoves(state, myColor),
      rng: this.rng,
    });
    this.fallbackDiagnostics = updateDiagnostics(this.fallbackDiagnostics, result);

    if (!result.move) {
      throw new MoveSelectionError(ClientErrorCode.MOVE_NO_LEGAL_MOVE, 'No fallback move available', {
        reason,
        turn: state.turn,
      });
    }
    logger.info('Using fallback move', { reason, move: formatMove(result.move) });
    return result.move;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  private transition(next: ClientSessionState): void {
    if (next.kind !== this.session.kind) {
      logger.debug('Session state changed', { from: this.session.kind, to: next.kind });
    }
    this.session = next;
  }

  private finish(reason: FinishReason): void {
    if (isFinished(this.session)) {
      return;
    }
    this.transition(markFinished(this.session, reason, this.result));

    if (this.fallbackDiagnostics.totalAttempts > 0) {
      logger.warn('Fallback moves were used', { ...this.fallbackDiagnostics });
    }
    logger.info('Game finished', { reason });

    this.connection.close();
    this.settle?.resolve(this.result);
  }

  /**
   * Fatal errors end the session. Anything else is logged and the session
   * goes on; the server decides whether the game can continue.
   */
  private fail(error: ClientError): void {
    if (isFinished(this.session)) {
      return;
    }
    if (!isFatalError(error)) {
      logger.error('Client error, continuing', { error: error.toJSON() });
      return;
    }
    logger.error('Client failed', { error: error.toJSON() });
    this.transition(markFinished(this.session, 'error', this.result));
    this.connection.close();
    this.settle?.reject(error);
  }
}
