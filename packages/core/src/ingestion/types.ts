/**
 * Ingestion Layer Types
 * Types for the chat connection, log sink, and receive loop
 */

// ===========================================
// Connection
// ===========================================

/**
 * A text-oriented stream connection to a chat server
 */
export interface ChatConnection {
  readonly closed: boolean;
  /** Write raw text as UTF-8; callers include the line terminator */
  send(text: string): Promise<void>;
  /** Received bytes, at most the configured chunk size per item */
  receive(): AsyncIterable<Uint8Array>;
  /** Close from outside; an active receive() ends without error */
  close(): void;
}

export interface ConnectOptions {
  secure: boolean;
  timeoutMs: number;
  chunkBytes: number;
}

export type Connector = (
  host: string,
  port: number,
  options: ConnectOptions
) => Promise<ChatConnection>;

// ===========================================
// Sink
// ===========================================

export interface ChatLogSink {
  append(timestamp: Date, text: string): Promise<void>;
  close(): Promise<void>;
}

// ===========================================
// Ingestor
// ===========================================

/**
 * Rewrites chunk text before it is persisted (e.g. pictographs to bracketed names)
 */
export type ChunkFilter = (text: string) => string;

export interface ChatIngestorConfig extends ConnectOptions {
  filter?: ChunkFilter;
  connector?: Connector;
}

export interface IngestSettings {
  host: string;
  port: number;
  token: string;
  nickname: string;
  channel: string;
}

export interface ReceiveLoopStats {
  chunksLogged: number;
  pingsAnswered: number;
  chunksSkipped: number;
}
