/**
 * parse command - print the chat messages of a log as JSON lines
 */

import { createChildLogger } from '@chatscribe/shared';
import { ChatLogParser } from '@chatscribe/core';

const logger = createChildLogger({ component: 'ParseCommand' });

export interface LineWriter {
  write(line: string): unknown;
}

export async function runParse(path: string, out: LineWriter): Promise<number> {
  const parser = new ChatLogParser();
  let count = 0;

  for await (const message of parser.parseLog(path)) {
    out.write(
      `${JSON.stringify({
        timestamp: message.timestamp.toISOString(),
        channel: message.channel,
        username: message.username,
        message: message.message,
      })}\n`
    );
    count++;
  }

  logger.debug({ path, count }, 'Printed parsed messages');
  return count;
}
