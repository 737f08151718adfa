/**
 * Structured logging for Chatscribe
 */

import { pino } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogContext {
  channel?: string;
  component?: string;
  [key: string]: unknown;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// Logs go to stderr; stdout carries command output such as parsed records
const STDERR_FD = 2;

function createBaseLogger(level: LogLevel): pino.Logger {
  const options: pino.LoggerOptions = {
    level,
    base: { service: 'chatscribe' },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (process.env.NODE_ENV === 'development') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: STDERR_FD,
        },
      },
    });
  }

  return pino(options, pino.destination({ dest: STDERR_FD, sync: true }));
}

let loggerInstance: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    const envLevel = process.env.LOG_LEVEL;
    loggerInstance = createBaseLogger(isLogLevel(envLevel) ? envLevel : 'info');
  }
  return loggerInstance;
}

// Create child logger with context
export function createChildLogger(context: LogContext): pino.Logger {
  return getLogger().child(context);
}

// Convenience function to create a named logger
export function createLogger(name: string): pino.Logger {
  return createChildLogger({ component: name });
}

export function logStateTransition(
  sessionId: string,
  fromState: string,
  toState: string,
  reason: string
): void {
  getLogger().info(
    {
      event: 'session_transition',
      sessionId,
      fromState,
      toState,
      reason,
    },
    `Session transition: ${fromState} -> ${toState}`
  );
}
