/**
 * Ingestion Layer
 * Connects to the chat server and persists every received chunk
 */

export * from './types.js';
export { ChatIngestor, normalizeChannel } from './chat-ingestor.js';
export type { ChatIngestorEvents } from './chat-ingestor.js';
export { TcpChatConnection, connect, DEFAULT_CONNECT_OPTIONS } from './chat-connection.js';
export { FileChatLogSink, MemoryChatLogSink } from './log-sink.js';
