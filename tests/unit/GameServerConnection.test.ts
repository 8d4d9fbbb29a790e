/**
 * GameServerConnection over an in-memory socket.
 */

import { GameServerConnection } from '../../src/client/services/GameServerConnection';
import { ClientError, ClientErrorCode, ConnectionError } from '../../src/shared/errors';
import { XmlNode, encodeJoin } from '../../src/shared/protocol';
import { FakeSocket, settle } from '../helpers/FakeSocket';

jest.mock('../../src/client/utils/logger', () => ({
  logger: { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() },
}));

describe('GameServerConnection', () => {
  let socket: FakeSocket;
  let connection: GameServerConnection;

  beforeEach(() => {
    socket = new FakeSocket();
    connection = new GameServerConnection(socket);
  });

  it('opens the protocol once', () => {
    connection.open();
    connection.open();
    expect(socket.written).toEqual(['<protocol>']);
  });

  it('writes serialized nodes', () => {
    connection.open();
    connection.send(encodeJoin('swc_2020_hive'));
    expect(socket.written).toEqual(['<protocol>', '<join gameType="swc_2020_hive"/>']);
  });

  it('emits complete top-level elements as messages', async () => {
    const messages: XmlNode[] = [];
    connection.on('message', (node) => messages.push(node));

    socket.serverSend('<protocol><joined roomId="room-1"/><room roomId="room-1">');
    socket.serverSend('<data class="sc.framework.plugins.protocol.MoveRequest"/></room>');
    await settle();

    expect(messages.map((m) => m.name)).toEqual(['joined', 'room']);
    expect(messages[1].child('data').attribute('class')).toBe('sc.framework.plugins.protocol.MoveRequest');
  });

  it('decodes multi-byte characters split between packets', async () => {
    const messages: XmlNode[] = [];
    connection.on('message', (node) => messages.push(node));
    const bytes = Buffer.from('<protocol><red color="RED" displayName="Jürgen"/>', 'utf8');
    const cut = bytes.indexOf(0xc3) + 1;

    socket.serverSend(bytes.subarray(0, cut));
    socket.serverSend(bytes.subarray(cut));
    await settle();

    expect(messages[0].attribute('displayName')).toBe('Jürgen');
  });

  it('emits end when the server closes the protocol', async () => {
    const onEnd = jest.fn();
    connection.on('end', onEnd);

    socket.serverSend('<protocol></protocol>');
    await settle();

    expect(onEnd).toHaveBeenCalledTimes(1);
  });

  it('reports malformed XML as a protocol error', async () => {
    const errors: ClientError[] = [];
    connection.on('error', (error) => errors.push(error));

    socket.serverSend('<protocol><joined></left>');
    await settle();

    expect(errors).toHaveLength(1);
    expect(errors[0].code).toBe(ClientErrorCode.PROTOCOL_MALFORMED_XML);
  });

  it('reports stream failures as connection errors', async () => {
    const errors: ClientError[] = [];
    const onClose = jest.fn();
    connection.on('error', (error) => errors.push(error));
    connection.on('close', onClose);

    socket.destroy(new Error('reset by peer'));
    await settle();

    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(ConnectionError);
    expect(errors[0].code).toBe(ClientErrorCode.CONNECTION_CLOSED);
    expect(errors[0].message).toBe('Connection failed: reset by peer');
    expect(onClose).toHaveBeenCalledTimes(1);
    expect(connection.isClosed).toBe(true);
  });

  it('closes the protocol and ends the stream', async () => {
    const onFinish = jest.fn();
    socket.on('finish', onFinish);

    connection.open();
    connection.close();
    connection.close();
    await settle();

    expect(socket.written).toEqual(['<protocol>', '</protocol>']);
    expect(onFinish).toHaveBeenCalledTimes(1);
    expect(connection.isClosed).toBe(true);
  });

  it('does not write a closing tag it never opened', () => {
    connection.close();
    expect(socket.written).toEqual([]);
  });

  it('refuses to send on a closed connection', () => {
    connection.open();
    connection.close();
    expect(() => connection.send(encodeJoin('swc_2020_hive'))).toThrow(
      'Cannot send <join> on a closed connection'
    );
  });

  it('notices when the server drops the connection', async () => {
    const onClose = jest.fn();
    connection.on('close', onClose);

    socket.serverClose();
    await settle();

    expect(onClose).toHaveBeenCalledTimes(1);
    expect(connection.isClosed).toBe(true);
  });
});
