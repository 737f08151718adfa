/**
 * Chat Connection
 * TCP/TLS transport that yields bounded byte chunks to the receive loop
 */

import { connect as netConnect, isIP, type Socket } from 'net';
import { connect as tlsConnect } from 'tls';
import type { Duplex } from 'stream';
import {
  ConnectionError,
  TransportReadError,
  createChildLogger,
} from '@chatscribe/shared';
import type { ChatConnection, ConnectOptions } from './types.js';

export const DEFAULT_CONNECT_OPTIONS: ConnectOptions = {
  secure: false,
  timeoutMs: 10000,
  chunkBytes: 2048,
};

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * End of the next slice of at most `maxBytes`, moved back so that a multi-byte
 * UTF-8 sequence is not split. Falls back to the hard limit when no boundary exists.
 */
function sliceEnd(buffer: Buffer, start: number, maxBytes: number): number {
  const limit = Math.min(start + maxBytes, buffer.length);
  if (limit === buffer.length) {
    return limit;
  }

  let end = limit;
  // 0b10xxxxxx marks a continuation byte
  while (end > start && (buffer.readUInt8(end) & 0xc0) === 0x80) {
    end--;
  }
  return end > start ? end : limit;
}

export class TcpChatConnection implements ChatConnection {
  private closing = false;
  private logger = createChildLogger({ component: 'TcpChatConnection' });

  constructor(
    private readonly socket: Duplex,
    private readonly chunkBytes: number = DEFAULT_CONNECT_OPTIONS.chunkBytes
  ) {
    // Errors outside an active receive() would otherwise be unhandled
    this.socket.on('error', (error: Error) => {
      this.logger.debug({ err: error }, 'Socket error');
    });
  }

  get closed(): boolean {
    return this.closing || this.socket.destroyed;
  }

  send(text: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.closed) {
        reject(new ConnectionError('Cannot write to a closed connection'));
        return;
      }

      this.socket.write(text, 'utf8', (error?: Error | null) => {
        if (error) {
          reject(new ConnectionError(`Write failed: ${error.message}`, { originalError: error.name }));
          return;
        }
        resolve();
      });
    });
  }

  async *receive(): AsyncGenerator<Uint8Array> {
    try {
      for await (const data of this.socket) {
        const buffer = Buffer.isBuffer(data) ? data : Buffer.from(String(data), 'utf8');

        let offset = 0;
        while (offset < buffer.length) {
          const end = sliceEnd(buffer, offset, this.chunkBytes);
          yield buffer.subarray(offset, end);
          offset = end;
        }
      }
    } catch (error) {
      if (this.closing) {
        return;
      }
      throw new TransportReadError(`Read failed: ${describeError(error)}`);
    }
  }

  close(): void {
    if (this.closing) {
      return;
    }
    this.closing = true;
    this.socket.destroy();
  }
}

/**
 * Open a stream connection to a chat server
 */
export function connect(
  host: string,
  port: number,
  options: Partial<ConnectOptions> = {}
): Promise<TcpChatConnection> {
  const { secure, timeoutMs, chunkBytes } = { ...DEFAULT_CONNECT_OPTIONS, ...options };

  return new Promise((resolve, reject) => {
    const socket: Socket = secure
      ? tlsConnect({ host, port, servername: isIP(host) ? undefined : host })
      : netConnect({ host, port });
    const readyEvent = secure ? 'secureConnect' : 'connect';

    const timer = setTimeout(() => {
      socket.off('error', onError);
      socket.destroy();
      reject(
        new ConnectionError(`Timed out connecting to ${host}:${port} after ${timeoutMs}ms`, {
          host,
          port,
        })
      );
    }, timeoutMs);

    const onError = (error: Error) => {
      clearTimeout(timer);
      reject(
        new ConnectionError(`Unable to connect to ${host}:${port}: ${error.message}`, {
          host,
          port,
          originalError: error.name,
        })
      );
    };

    socket.once('error', onError);
    socket.once(readyEvent, () => {
      clearTimeout(timer);
      socket.off('error', onError);
      resolve(new TcpChatConnection(socket, chunkBytes));
    });
  });
}
