/**
 * Parsing Layer
 * Recovers structured chat messages from the persisted log
 */

export { ChatLogParser, parseLog } from './chat-log-parser.js';
export { parsePrivmsgLine, findPrivmsg } from './privmsg-parser.js';
export type { PrivmsgFields } from './privmsg-parser.js';
