import type { AxialCoords, Move, Piece } from '../types/game';
import { axialToCube } from '../engine/hexCoords';
import { ClientErrorCode, ProtocolError } from '../errors';
import { DATA_CLASSES, Data } from './messages';
import { XmlNode } from './XmlNode';

export function encodePiece(piece: Piece): XmlNode {
  return XmlNode.builder('piece').attribute('owner', piece.owner).attribute('type', piece.type).build();
}

/** Writes axial coordinates as `x`, `y`, `z` cube attributes. */
export function encodeCoords(name: string, coords: AxialCoords): XmlNode {
  const { x, y, z } = axialToCube(coords);
  return XmlNode.builder(name).attribute('x', x).attribute('y', y).attribute('z', z).build();
}

export function encodeMove(move: Move): XmlNode {
  const data = XmlNode.builder('data');
  switch (move.type) {
    case 'set':
      return data
        .attribute('class', DATA_CLASSES.setMove)
        .child(encodePiece(move.piece))
        .child(encodeCoords('destination', move.destination))
        .build();
    case 'drag':
      return data
        .attribute('class', DATA_CLASSES.dragMove)
        .child(encodeCoords('start', move.start))
        .child(encodeCoords('destination', move.destination))
        .build();
    case 'skip':
      return data.attribute('class', DATA_CLASSES.skipMove).build();
  }
}

/**
 * Only moves are ever sent to the server.
 *
 * @throws ProtocolError for any other data
 */
export function encodeData(data: Data): XmlNode {
  if (data.kind === 'move') {
    return encodeMove(data.move);
  }
  throw new ProtocolError(
    ClientErrorCode.PROTOCOL_UNEXPECTED_MESSAGE,
    `${data.kind} can currently not be serialized`,
    { kind: data.kind }
  );
}

export function encodeRoom(roomId: string, data: Data): XmlNode {
  return XmlNode.builder('room').attribute('roomId', roomId).child(encodeData(data)).build();
}

export function encodeJoin(gameType: string): XmlNode {
  return XmlNode.builder('join').attribute('gameType', gameType).build();
}

export function encodeJoinPrepared(reservationCode: string): XmlNode {
  return XmlNode.builder('joinPrepared').attribute('reservationCode', reservationCode).build();
}

export const PROTOCOL_OPEN = '<protocol>';
export const PROTOCOL_CLOSE = '</protocol>';
