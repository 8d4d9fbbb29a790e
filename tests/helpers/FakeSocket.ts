/**
 * FakeSocket - in-memory stand-in for the TCP socket to the game server.
 *
 * Everything the client writes is collected in `written`; the test plays
 * the server through `serverSend` and `serverClose`.
 *
 * @example
 * ```typescript
 * const socket = new FakeSocket();
 * const connection = new GameServerConnection(socket);
 * connection.open();
 * socket.serverSend('<protocol><joined roomId="room-1"/>');
 * await settle();
 * ```
 */

import { Duplex } from 'stream';

export class FakeSocket extends Duplex {
  readonly written: string[] = [];

  constructor() {
    super({ allowHalfOpen: false });
  }

  override _read(): void {
    // Data is pushed by serverSend.
  }

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.written.push(chunk.toString());
    callback();
  }

  serverSend(xml: string | Buffer): void {
    this.push(xml);
  }

  /** Ends the incoming side, as a server dropping the connection would. */
  serverClose(): void {
    this.push(null);
  }

  get lastWritten(): string | undefined {
    return this.written[this.written.length - 1];
  }
}

/**
 * Lets pending stream events, promise callbacks and immediates run.
 */
export async function settle(): Promise<void> {
  for (let i = 0; i < 2; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}
