export { XmlNode, XmlNodeBuilder, escapeXml } from './XmlNode';
export { XmlStreamReader } from './XmlStreamReader';
export * from './messages';
export {
  decodeServerMessage,
  decodeData,
  decodeGameState,
  decodeBoard,
  decodeField,
  decodeCoords,
  decodePiece,
  decodePlayer,
  decodeMove,
  decodeGameResult,
  decodePlayerScore,
  decodeScoreDefinition,
  decodeScoreFragment,
} from './decoding';
export {
  encodeMove,
  encodeData,
  encodeRoom,
  encodeJoin,
  encodeJoinPrepared,
  encodePiece,
  encodeCoords,
  PROTOCOL_OPEN,
  PROTOCOL_CLOSE,
} from './encoding';
