/**
 * Core types for Chatscribe
 */

// Ingest session states
export const SESSION_STATES = {
  IDLE: 'IDLE',
  CONNECTING: 'CONNECTING',
  CONNECTED: 'CONNECTED',
  CLOSING: 'CLOSING',
  CLOSED: 'CLOSED',
} as const;

export type SessionState = (typeof SESSION_STATES)[keyof typeof SESSION_STATES];

// ===========================================
// Chat Records
// ===========================================

/**
 * A chat message recovered from the persisted log
 */
export interface ParsedMessage {
  timestamp: Date;
  channel: string;
  username: string;
  message: string;
}

export type ParseFailureReason =
  | 'empty_record'
  | 'invalid_timestamp'
  | 'missing_separator'
  | 'not_privmsg';

export type RecordParseResult =
  | { ok: true; message: ParsedMessage }
  | { ok: false; reason: ParseFailureReason; record: string };

export interface ParseSummary {
  parsed: number;
  dropped: number;
  dropReasons: Record<ParseFailureReason, number>;
}

// ===========================================
// Log Format
// ===========================================

/** date-fns pattern of the timestamp that prefixes every log record */
export const LOG_TIMESTAMP_FORMAT = 'yyyy-MM-dd_HH:mm:ss';

/** Separator glyph between the timestamp and the raw chunk */
export const LOG_SEPARATOR = '—';

/** Written after every record; the parser splits on it */
export const LOG_RECORD_DELIMITER = '\n\n\n';

// ===========================================
// IRC Keywords
// ===========================================

export const LIVENESS_PROBE = 'PING';
export const LIVENESS_RESPONSE = 'PONG';
