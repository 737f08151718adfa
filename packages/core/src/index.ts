/**
 * @chatscribe/core
 * Chat ingestion session and log parsing for Chatscribe
 */

// State machine
export * from './state-machine/index.js';

// Log format - record layout shared by the sink and the parser
export * from './log-format/index.js';

// Ingestion Layer - connection, receive loop, and log sinks
export * from './ingestion/index.js';

// Parsing Layer - log records back into chat messages
export * from './parsing/index.js';
