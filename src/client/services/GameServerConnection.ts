/**
 * Game Server Connection - XML stream transport to the game server.
 *
 * Wraps a duplex byte stream (a TCP socket in production, an in-memory
 * stream in tests):
 * - Opens the protocol by writing `<protocol>`
 * - Feeds incoming bytes to an {@link XmlStreamReader}
 * - Serializes outgoing {@link XmlNode}s
 * - Closes the protocol with `</protocol>` before ending the stream
 *
 * Events:
 * - `message` (node: XmlNode): a complete top-level element
 * - `end` (): the server closed the protocol
 * - `error` (error: ClientError): transport or XML failure
 * - `close` (): the underlying stream is gone
 */

import { EventEmitter } from 'events';
import net from 'net';
import type { Duplex } from 'stream';
import { ClientError, ClientErrorCode, ConnectionError } from '../../shared/errors';
import { PROTOCOL_CLOSE, PROTOCOL_OPEN, XmlNode, XmlStreamReader } from '../../shared/protocol';
import { logger } from '../utils/logger';

export interface GameServerConnection {
  on(event: 'message', listener: (node: XmlNode) => void): this;
  on(event: 'end', listener: () => void): this;
  on(event: 'error', listener: (error: ClientError) => void): this;
  on(event: 'close', listener: () => void): this;
}

export class GameServerConnection extends EventEmitter {
  private readonly reader = new XmlStreamReader();
  private opened = false;
  private closed = false;

  constructor(private readonly stream: Duplex) {
    super();

    this.reader.on('node', (node) => {
      logger.debug('Received message', { name: node.name });
      this.emit('message', node);
    });
    this.reader.on('end', () => this.emit('end'));
    this.reader.on('error', (error) => this.emit('error', error));

    this.stream.on('data', (chunk: Buffer | string) => this.reader.write(chunk));
    this.stream.on('error', (error: Error) => {
      this.emit(
        'error',
        new ConnectionError(ClientErrorCode.CONNECTION_CLOSED, `Connection failed: ${error.message}`)
      );
    });
    this.stream.on('close', () => {
      this.closed = true;
      this.emit('close');
    });
  }

  /**
   * Opens a TCP connection to the game server.
   *
   * @throws ConnectionError when the server cannot be reached
   */
  static connect(host: string, port: number): Promise<GameServerConnection> {
    return new Promise((resolve, reject) => {
      const socket = net.connect({ host, port });

      const onError = (error: Error) => {
        socket.destroy();
        reject(
          new ConnectionError(
            ClientErrorCode.CONNECTION_FAILED,
            `Could not connect to ${host}:${port}: ${error.message}`,
            { host, port }
          )
        );
      };

      socket.once('error', onError);
      socket.once('connect', () => {
        socket.removeListener('error', onError);
        logger.info('Connected to game server', { host, port });
        resolve(new GameServerConnection(socket));
      });
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Writes the opening `<protocol>` tag. Idempotent. */
  open(): void {
    if (this.opened) return;
    this.opened = true;
    this.stream.write(PROTOCOL_OPEN);
  }

  send(node: XmlNode): void {
    if (this.closed) {
      throw new ConnectionError(
        ClientErrorCode.CONNECTION_CLOSED,
        `Cannot send <${node.name}> on a closed connection`
      );
    }
    const xml = node.toXml();
    logger.debug('Sending message', { xml });
    this.stream.write(xml);
  }

  /** Writes `</protocol>` and ends the stream. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.opened) {
      this.stream.write(PROTOCOL_CLOSE);
    }
    this.stream.end();
  }
}
