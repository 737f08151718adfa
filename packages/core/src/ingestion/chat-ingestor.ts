/**
 * Chat Ingestor
 * Connects to a chat server, joins one channel, answers liveness probes and
 * appends every other received chunk to a log sink.
 */

import { randomUUID } from 'crypto';
import { EventEmitter } from 'eventemitter3';
import {
  SESSION_STATES,
  LIVENESS_PROBE,
  LIVENESS_RESPONSE,
  ConnectionError,
  DecodeError,
  StateMachineError,
  createChildLogger,
  type SessionState,
} from '@chatscribe/shared';
import { SessionStateMachine } from '../state-machine/index.js';
import { connect, DEFAULT_CONNECT_OPTIONS } from './chat-connection.js';
import type {
  ChatConnection,
  ChatIngestorConfig,
  ChatLogSink,
  Connector,
  IngestSettings,
  ReceiveLoopStats,
} from './types.js';

export interface ChatIngestorEvents {
  'state:changed': { from: SessionState; to: SessionState; reason: string };
  ping: { at: Date };
  'chunk:logged': { timestamp: Date; text: string };
  'chunk:skipped': { error: DecodeError };
}

export function normalizeChannel(channel: string): string {
  return channel.startsWith('#') ? channel : `#${channel}`;
}

export class ChatIngestor extends EventEmitter<ChatIngestorEvents> {
  private config: ChatIngestorConfig;
  private connector: Connector;
  private machine: SessionStateMachine;
  private connection: ChatConnection | null = null;
  private decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
  private readonly sessionId = randomUUID();
  private logger = createChildLogger({ component: 'ChatIngestor', sessionId: this.sessionId });

  constructor(
    private readonly sink: ChatLogSink,
    config: Partial<ChatIngestorConfig> = {}
  ) {
    super();
    this.config = { ...DEFAULT_CONNECT_OPTIONS, ...config };
    this.connector = this.config.connector ?? connect;
    this.machine = new SessionStateMachine(this.sessionId);
    this.machine.on('state:changed', (change) => this.emit('state:changed', change));
  }

  getState(): SessionState {
    return this.machine.getState();
  }

  getSessionId(): string {
    return this.sessionId;
  }

  /**
   * Open the connection for this session
   */
  async connect(host: string, port: number): Promise<ChatConnection> {
    this.machine.transition(SESSION_STATES.CONNECTING, 'connect_requested');

    let connection: ChatConnection;
    try {
      connection = await this.connector(host, port, {
        secure: this.config.secure,
        timeoutMs: this.config.timeoutMs,
        chunkBytes: this.config.chunkBytes,
      });
    } catch (error) {
      this.machine.transition(SESSION_STATES.CLOSED, 'connect_failed');
      if (error instanceof ConnectionError) {
        throw error;
      }
      throw new ConnectionError(
        `Unable to connect to ${host}:${port}: ${error instanceof Error ? error.message : String(error)}`,
        { host, port }
      );
    }

    this.connection = connection;
    this.machine.transition(SESSION_STATES.CONNECTED, 'socket_open');
    this.logger.info({ host, port, secure: this.config.secure }, 'Connected to chat server');

    return connection;
  }

  /**
   * Send credential, identity and join lines. The server does not acknowledge them;
   * a rejected login shows up later as missing traffic.
   */
  async authenticate(
    conn: ChatConnection,
    token: string,
    nickname: string,
    channel: string
  ): Promise<void> {
    const target = normalizeChannel(channel);

    try {
      await conn.send(`PASS ${token}\n`);
      await conn.send(`NICK ${nickname}\n`);
      await conn.send(`JOIN ${target}\n`);
    } catch (error) {
      this.terminate(conn, 'authenticate_failed');
      if (error instanceof ConnectionError) {
        throw error;
      }
      throw new ConnectionError(
        `Authentication lines could not be sent: ${error instanceof Error ? error.message : String(error)}`,
        { channel: target }
      );
    }

    this.logger.info({ nickname, channel: target }, 'Sent credentials and joined channel');
  }

  /**
   * Receive until the connection ends, is closed from outside, or the signal aborts
   */
  async receiveLoop(conn: ChatConnection, signal?: AbortSignal): Promise<ReceiveLoopStats> {
    if (!this.machine.isOpen()) {
      throw new StateMachineError(
        `Receive loop requires a connected session (state: ${this.machine.getState()})`,
        'E5002'
      );
    }

    const stats: ReceiveLoopStats = { chunksLogged: 0, pingsAnswered: 0, chunksSkipped: 0 };
    const onAbort = () => this.close('cancelled');

    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      for await (const chunk of conn.receive()) {
        if (!this.machine.isOpen()) {
          break;
        }
        await this.handleChunk(conn, chunk, stats);
      }
    } catch (error) {
      const cancelling = this.machine.getState() === SESSION_STATES.CLOSING;
      this.terminate(conn, cancelling ? 'cancelled' : 'receive_failed');

      // A write racing the cancellation is not a failure of the session
      if (cancelling && error instanceof ConnectionError) {
        return stats;
      }
      this.logger.error({ err: error, ...stats }, 'Receive loop failed');
      throw error;
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    this.terminate(
      conn,
      this.machine.getState() === SESSION_STATES.CLOSING ? 'cancelled' : 'connection_ended'
    );
    this.logger.info({ ...stats }, 'Receive loop finished');

    return stats;
  }

  /**
   * Connect, authenticate and receive until the session ends
   */
  async run(settings: IngestSettings, signal?: AbortSignal): Promise<ReceiveLoopStats> {
    const conn = await this.connect(settings.host, settings.port);
    await this.authenticate(conn, settings.token, settings.nickname, settings.channel);
    return this.receiveLoop(conn, signal);
  }

  /**
   * Request shutdown; the receive loop observes it and exits
   */
  close(reason: string = 'close_requested'): void {
    if (this.machine.getState() === SESSION_STATES.CONNECTED) {
      this.machine.transition(SESSION_STATES.CLOSING, reason);
    }
    this.connection?.close();
  }

  private async handleChunk(
    conn: ChatConnection,
    chunk: Uint8Array,
    stats: ReceiveLoopStats
  ): Promise<void> {
    let text: string;
    try {
      text = this.decoder.decode(chunk);
    } catch {
      // A read boundary may split a multi-byte sequence
      const error = new DecodeError(chunk.byteLength);
      this.logger.warn({ err: error }, 'Skipping chunk that is not valid UTF-8');
      stats.chunksSkipped++;
      this.emit('chunk:skipped', { error });
      return;
    }

    if (text.startsWith(LIVENESS_PROBE)) {
      await conn.send(`${LIVENESS_RESPONSE}\n`);
      stats.pingsAnswered++;
      this.logger.debug('Answered liveness probe');
      this.emit('ping', { at: new Date() });
      return;
    }

    if (text.length === 0) {
      return;
    }

    const timestamp = new Date();
    const persisted = this.config.filter ? this.config.filter(text) : text;
    await this.sink.append(timestamp, persisted);
    stats.chunksLogged++;
    this.emit('chunk:logged', { timestamp, text: persisted });
  }

  private terminate(conn: ChatConnection, reason: string): void {
    const state = this.machine.getState();
    if (state === SESSION_STATES.CONNECTED || state === SESSION_STATES.CLOSING) {
      this.machine.transition(SESSION_STATES.CLOSED, reason);
    }
    conn.close();
  }
}
