/**
 * Chatscribe CLI
 *
 *   chatscribe ingest          log the configured channel until SIGINT/SIGTERM
 *   chatscribe parse [path]    print parsed chat messages as JSON lines
 */

import { createLogger, wrapError, DEFAULT_CHAT_LOG_PATH } from '@chatscribe/shared';
import { runIngest } from './commands/ingest.js';
import { runParse } from './commands/parse.js';

const logger = createLogger('CLI');

const USAGE = 'Usage: chatscribe <ingest | parse [path]>';

async function main(argv: string[]): Promise<number> {
  const [command, path] = argv;

  switch (command) {
    case 'ingest': {
      const controller = new AbortController();
      const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down...`);
        controller.abort();
      };
      process.once('SIGINT', () => shutdown('SIGINT'));
      process.once('SIGTERM', () => shutdown('SIGTERM'));

      const stats = await runIngest(controller.signal);
      logger.info({ ...stats }, 'Ingest finished');
      return 0;
    }

    case 'parse': {
      const logPath = path ?? process.env.CHAT_LOG_PATH ?? DEFAULT_CHAT_LOG_PATH;
      await runParse(logPath, process.stdout);
      return 0;
    }

    default:
      process.stderr.write(`${USAGE}\n`);
      return 2;
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const wrapped = wrapError(error);
    logger.error({ err: wrapped, code: wrapped.code }, wrapped.message);
    process.exitCode = 1;
  });
