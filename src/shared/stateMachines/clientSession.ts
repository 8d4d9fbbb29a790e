import type { GameState, PlayerColor } from '../types/game';
import type { GameResult } from '../protocol/messages';

/**
 * Explicit lifecycle model for the client's session with the game server:
 *
 * ```
 * idle -> joining -> joined -> playing -> finished
 * ```
 *
 * Any state may go straight to `finished` (server left the room, stream
 * closed, fatal error). Transitions are pure; the client owns the current
 * value and logs each change.
 */

export interface IdleSession {
  kind: 'idle';
}

export interface JoiningSession {
  kind: 'joining';
  /** Whether a reservation code was used to join */
  prepared: boolean;
}

export interface JoinedSession {
  kind: 'joined';
  roomId: string;
}

export interface PlayingSession {
  kind: 'playing';
  roomId: string;
  myColor: PlayerColor;
  /** Latest state from the server; absent until the first memento */
  state?: GameState | undefined;
}

export type FinishReason = 'left' | 'stream_end' | 'error';

export interface FinishedSession {
  kind: 'finished';
  reason: FinishReason;
  roomId?: string | undefined;
  myColor?: PlayerColor | undefined;
  result?: GameResult | undefined;
}

export type ClientSessionState =
  | IdleSession
  | JoiningSession
  | JoinedSession
  | PlayingSession
  | FinishedSession;

export type ClientSessionKind = ClientSessionState['kind'];

export function initialSession(): ClientSessionState {
  return { kind: 'idle' };
}

export function markJoining(prepared: boolean): ClientSessionState {
  return { kind: 'joining', prepared };
}

export function markJoined(roomId: string): ClientSessionState {
  return { kind: 'joined', roomId };
}

/**
 * The welcome message assigns our color. Reaching this from anything but
 * `joined` means the server skipped the join confirmation; the room id is
 * then taken from the welcome's room.
 */
export function markWelcomed(
  previous: ClientSessionState,
  roomId: string,
  myColor: PlayerColor
): ClientSessionState {
  return {
    kind: 'playing',
    roomId: previous.kind === 'joined' ? previous.roomId : roomId,
    myColor,
    state: previous.kind === 'playing' ? previous.state : undefined,
  };
}

/**
 * Records a new game state. Ignored outside `playing`.
 */
export function withGameState(previous: ClientSessionState, state: GameState): ClientSessionState {
  if (previous.kind !== 'playing') {
    return previous;
  }
  return { ...previous, state };
}

/**
 * Finishing is terminal: a finished session stays as it is.
 */
export function markFinished(
  previous: ClientSessionState,
  reason: FinishReason,
  result?: GameResult
): ClientSessionState {
  if (previous.kind === 'finished') {
    return previous;
  }

  return {
    kind: 'finished',
    reason,
    roomId: previous.kind === 'joined' || previous.kind === 'playing' ? previous.roomId : undefined,
    myColor: previous.kind === 'playing' ? previous.myColor : undefined,
    result,
  };
}

export function isFinished(state: ClientSessionState): state is FinishedSession {
  return state.kind === 'finished';
}
