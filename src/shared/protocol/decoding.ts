import type {
  AxialCoords,
  Field,
  GameState,
  Move,
  Piece,
  Player,
  PlayerColor,
  PositionedField,
} from '../types/game';
import { isPieceType, isPlayerColor } from '../types/game';
import { Board } from '../engine/Board';
import { cubeToAxial } from '../engine/hexCoords';
import { BOARD_RADIUS } from '../engine/rulesConfig';
import { ClientErrorCode, ProtocolError } from '../errors';
import {
  DATA_CLASSES,
  Data,
  GameResult,
  PlayerScore,
  SCORE_AGGREGATIONS,
  SCORE_CAUSES,
  ScoreAggregation,
  ScoreCause,
  ScoreDefinition,
  ScoreFragment,
  ServerMessage,
} from './messages';
import type { XmlNode } from './XmlNode';

// ═══════════════════════════════════════════════════════════════════════════
// PRIMITIVES
// ═══════════════════════════════════════════════════════════════════════════

function invalidValue(node: XmlNode, what: string, raw: string): ProtocolError {
  return new ProtocolError(
    ClientErrorCode.PROTOCOL_INVALID_VALUE,
    `Invalid ${what} '${raw}' in <${node.name}>`,
    { node: node.name, raw }
  );
}

export function parseIntValue(node: XmlNode, raw: string, what: string): number {
  if (!/^[-+]?\d+$/.test(raw.trim())) {
    throw invalidValue(node, what, raw);
  }
  return Number.parseInt(raw, 10);
}

export function parseBooleanValue(node: XmlNode, raw: string, what: string): boolean {
  switch (raw.trim()) {
    case 'true':
      return true;
    case 'false':
      return false;
    default:
      throw invalidValue(node, what, raw);
  }
}

function intAttribute(node: XmlNode, key: string): number {
  return parseIntValue(node, node.attribute(key), key);
}

// The server writes colors and piece types in either case (`red`, `RED`).
function colorAttribute(node: XmlNode, key: string): PlayerColor {
  const raw = node.attribute(key);
  const color = raw.toUpperCase();
  if (!isPlayerColor(color)) {
    throw invalidValue(node, 'player color', raw);
  }
  return color;
}

// ═══════════════════════════════════════════════════════════════════════════
// GAME
// ═══════════════════════════════════════════════════════════════════════════

export function decodePiece(node: XmlNode): Piece {
  const raw = node.attribute('type');
  const type = raw.toUpperCase();
  if (!isPieceType(type)) {
    throw invalidValue(node, 'piece type', raw);
  }
  return { owner: colorAttribute(node, 'owner'), type };
}

export function decodePlayer(node: XmlNode): Player {
  return {
    color: colorAttribute(node, 'color'),
    displayName: node.attribute('displayName'),
  };
}

/** Reads `x`, `y`, `z` cube attributes as axial coordinates. */
export function decodeCoords(node: XmlNode): AxialCoords {
  const x = intAttribute(node, 'x');
  const y = intAttribute(node, 'y');
  const z = intAttribute(node, 'z');
  if (x + y + z !== 0) {
    throw new ProtocolError(
      ClientErrorCode.PROTOCOL_INVALID_VALUE,
      `Cube coordinates (${x}, ${y}, ${z}) in <${node.name}> do not sum to zero`,
      { x, y, z }
    );
  }
  return cubeToAxial({ x, y, z });
}

export function decodeField(node: XmlNode): Field {
  return {
    pieces: node.childrenNamed('piece').map(decodePiece),
    isObstructed: parseBooleanValue(node, node.attribute('isObstructed'), 'isObstructed'),
  };
}

/**
 * Decodes `<board><fields><field .../>...</fields>...</board>`. Fields the
 * server leaves out are filled in empty up to the standard board radius.
 */
export function decodeBoard(node: XmlNode): Board {
  const fields: PositionedField[] = node
    .childrenNamed('fields')
    .flatMap((group) => group.childrenNamed('field'))
    .map((f) => ({ coords: decodeCoords(f), field: decodeField(f) }));
  return Board.fillingRadius(BOARD_RADIUS, fields);
}

export function decodeGameState(node: XmlNode): GameState {
  const red = decodePlayer(node.child('red'));
  const blue = decodePlayer(node.child('blue'));
  const lastMove = node.optionalChild('lastMove');
  return {
    turn: intAttribute(node, 'turn'),
    startPlayerColor: colorAttribute(node, 'startPlayerColor'),
    currentPlayerColor: colorAttribute(node, 'currentPlayerColor'),
    board: decodeBoard(node.child('board')),
    players: { RED: red, BLUE: blue },
    undeployedPieces: {
      RED: node.child('undeployedRedPieces').childrenNamed('piece').map(decodePiece),
      BLUE: node.child('undeployedBluePieces').childrenNamed('piece').map(decodePiece),
    },
    ...(lastMove ? { lastMove: decodeMove(lastMove) } : {}),
  };
}

export function decodeMove(node: XmlNode): Move {
  const cls = node.attribute('class');
  switch (cls) {
    case DATA_CLASSES.setMove:
      return {
        type: 'set',
        piece: decodePiece(node.child('piece')),
        destination: decodeCoords(node.child('destination')),
      };
    case DATA_CLASSES.dragMove:
      return {
        type: 'drag',
        start: decodeCoords(node.child('start')),
        destination: decodeCoords(node.child('destination')),
      };
    case DATA_CLASSES.skipMove:
      return { type: 'skip' };
    default:
      throw invalidValue(node, 'move class', cls);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════════════════

function decodeAggregation(node: XmlNode): ScoreAggregation {
  const raw = node.content.trim();
  const found = SCORE_AGGREGATIONS.find((a) => a === raw);
  if (!found) {
    throw invalidValue(node, 'score aggregation', raw);
  }
  return found;
}

function decodeCause(node: XmlNode): ScoreCause {
  const raw = node.attribute('cause');
  const found = SCORE_CAUSES.find((c) => c === raw);
  if (!found) {
    throw invalidValue(node, 'score cause', raw);
  }
  return found;
}

export function decodeScoreFragment(node: XmlNode): ScoreFragment {
  const relevant = node.child('relevantForRanking');
  return {
    name: node.attribute('name'),
    aggregation: decodeAggregation(node.child('aggregation')),
    relevantForRanking: parseBooleanValue(relevant, relevant.content, 'relevantForRanking'),
  };
}

export function decodeScoreDefinition(node: XmlNode): ScoreDefinition {
  return { fragments: node.childrenNamed('fragment').map(decodeScoreFragment) };
}

export function decodePlayerScore(node: XmlNode): PlayerScore {
  return {
    cause: decodeCause(node),
    reason: node.optionalAttribute('reason') ?? '',
    parts: node.childrenNamed('part').map((part) => parseIntValue(part, part.content, 'score part')),
  };
}

export function decodeGameResult(node: XmlNode): GameResult {
  return {
    definition: decodeScoreDefinition(node.child('definition')),
    scores: node.childrenNamed('score').map(decodePlayerScore),
    winners: node.childrenNamed('winner').map(decodePlayer),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// MESSAGES
// ═══════════════════════════════════════════════════════════════════════════

export function decodeData(node: XmlNode): Data {
  const cls = node.attribute('class');
  switch (cls) {
    case DATA_CLASSES.welcomeMessage:
      return { kind: 'welcomeMessage', color: colorAttribute(node, 'color') };
    case DATA_CLASSES.memento:
      return { kind: 'memento', state: decodeGameState(node.child('state')) };
    case DATA_CLASSES.moveRequest:
      return { kind: 'moveRequest' };
    case DATA_CLASSES.result:
      return { kind: 'result', result: decodeGameResult(node) };
    case DATA_CLASSES.error:
      return { kind: 'error', message: node.attribute('message') };
    case DATA_CLASSES.setMove:
    case DATA_CLASSES.dragMove:
    case DATA_CLASSES.skipMove:
      return { kind: 'move', move: decodeMove(node) };
    default:
      throw new ProtocolError(
        ClientErrorCode.PROTOCOL_UNEXPECTED_MESSAGE,
        `Unrecognized data class: ${cls}`,
        { class: cls }
      );
  }
}

/**
 * Decodes a top-level element of the protocol stream.
 *
 * @throws ProtocolError for unknown elements or malformed contents
 */
export function decodeServerMessage(node: XmlNode): ServerMessage {
  switch (node.name) {
    case 'joined':
      return { kind: 'joined', roomId: node.attribute('roomId') };
    case 'left':
      return { kind: 'left', roomId: node.attribute('roomId') };
    case 'room':
      return {
        kind: 'room',
        roomId: node.attribute('roomId'),
        data: decodeData(node.child('data')),
      };
    default:
      throw new ProtocolError(
        ClientErrorCode.PROTOCOL_UNEXPECTED_MESSAGE,
        `Unrecognized message <${node.name}>`,
        { node: node.name }
      );
  }
}
