/**
 * PRIVMSG matcher
 *
 * Accepts one IRC line of the shape
 *   [@tags ]:<username>!<ident>@<host>.tmi.<domain> PRIVMSG #<channel> :<message>
 * and rejects everything else (server notices, JOIN/PART, numerics, partial lines).
 */

export interface PrivmsgFields {
  username: string;
  channel: string;
  message: string;
}

const COMMAND = 'PRIVMSG';
const HOST_MARKER = '.tmi.';

/**
 * Split a line into tag block, prefix, command and the text after it
 */
function tokenize(line: string): { prefix: string; command: string; params: string } | null {
  let rest = line;

  // IRCv3 tags are only present when the client requested them
  if (rest.startsWith('@')) {
    const tagsEnd = rest.indexOf(' ');
    if (tagsEnd < 0) return null;
    rest = rest.slice(tagsEnd + 1);
  }

  if (!rest.startsWith(':')) return null;

  const prefixEnd = rest.indexOf(' ');
  if (prefixEnd < 0) return null;
  const prefix = rest.slice(1, prefixEnd);

  rest = rest.slice(prefixEnd + 1);
  const commandEnd = rest.indexOf(' ');
  if (commandEnd < 0) return null;

  return {
    prefix,
    command: rest.slice(0, commandEnd),
    params: rest.slice(commandEnd + 1),
  };
}

function usernameFromPrefix(prefix: string): string | null {
  const bang = prefix.indexOf('!');
  if (bang <= 0) return null;

  const at = prefix.indexOf('@', bang + 1);
  if (at < 0) return null;

  const host = prefix.slice(at + 1);
  const marker = host.indexOf(HOST_MARKER);
  if (marker < 0 || marker + HOST_MARKER.length >= host.length) return null;

  return prefix.slice(0, bang);
}

/**
 * Match a single line; trailing CR is ignored
 */
export function parsePrivmsgLine(rawLine: string): PrivmsgFields | null {
  const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
  const tokens = tokenize(line);
  if (!tokens || tokens.command !== COMMAND) return null;

  const username = usernameFromPrefix(tokens.prefix);
  if (!username) return null;

  if (!tokens.params.startsWith('#')) return null;
  const channelEnd = tokens.params.indexOf(' :');
  if (channelEnd < 0) return null;

  const channel = tokens.params.slice(1, channelEnd);
  const message = tokens.params.slice(channelEnd + 2);
  if (!channel || channel.includes(' ') || !message.trim()) return null;

  return { username, channel, message };
}

/**
 * First PRIVMSG among the lines of a record body
 */
export function findPrivmsg(body: string): PrivmsgFields | null {
  for (const line of body.split('\n')) {
    const fields = parsePrivmsgLine(line);
    if (fields) return fields;
  }
  return null;
}
