/**
 * ingest command - log one channel until interrupted
 */

import { getConfig, createChildLogger } from '@chatscribe/shared';
import { ChatIngestor, FileChatLogSink, type ReceiveLoopStats } from '@chatscribe/core';

const logger = createChildLogger({ component: 'IngestCommand' });

export async function runIngest(signal: AbortSignal): Promise<ReceiveLoopStats> {
  const config = getConfig();
  const sink = new FileChatLogSink(config.ingest.logPath);

  const ingestor = new ChatIngestor(sink, {
    secure: config.irc.secure,
    timeoutMs: config.irc.connectTimeoutMs,
    chunkBytes: config.ingest.chunkBytes,
  });

  logger.info(
    { channel: config.irc.channel, logPath: sink.getPath(), sessionId: ingestor.getSessionId() },
    'Starting ingest'
  );

  try {
    return await ingestor.run(
      {
        host: config.irc.host,
        port: config.irc.port,
        token: config.irc.token,
        nickname: config.irc.nickname,
        channel: config.irc.channel,
      },
      signal
    );
  } finally {
    await sink.close();
  }
}
