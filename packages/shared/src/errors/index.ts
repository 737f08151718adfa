/**
 * Custom error hierarchy for Chatscribe
 */

export type ErrorCategory =
  | 'CONFIGURATION'
  | 'CONNECTION'
  | 'TRANSPORT'
  | 'DECODE'
  | 'STORAGE'
  | 'STATE_MACHINE'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  channel?: string;
  [key: string]: unknown;
}

/**
 * Base error class for Chatscribe
 */
export class ChatscribeError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message);
    this.name = 'ChatscribeError';
    this.code = code;
    this.context = {
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'MEDIUM',
      retryable: context.retryable ?? false,
      ...context,
    };
    this.timestamp = new Date();

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * Connection errors (connect and authenticate phase)
 * Fatal to the ingest session; the caller owns the reconnect policy.
 */
export class ConnectionError extends ChatscribeError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E2001', {
      category: 'CONNECTION',
      severity: 'HIGH',
      retryable: true,
      ...context,
    });
    this.name = 'ConnectionError';
  }
}

/**
 * Read failure in the middle of a receive loop
 */
export class TransportReadError extends ChatscribeError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E2002', {
      category: 'TRANSPORT',
      severity: 'HIGH',
      retryable: true,
      ...context,
    });
    this.name = 'TransportReadError';
  }
}

/**
 * A received chunk that is not valid UTF-8
 */
export class DecodeError extends ChatscribeError {
  public readonly byteLength: number;

  constructor(byteLength: number, context: Partial<ErrorContext> = {}) {
    super(`Chunk of ${byteLength} bytes is not valid UTF-8`, 'E3001', {
      category: 'DECODE',
      severity: 'LOW',
      retryable: false,
      ...context,
    });
    this.name = 'DecodeError';
    this.byteLength = byteLength;
  }
}

/**
 * Log file errors (append or read)
 */
export class StorageError extends ChatscribeError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E4001', {
      category: 'STORAGE',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'StorageError';
  }
}

/**
 * State machine errors
 */
export class StateMachineError extends ChatscribeError {
  constructor(message: string, code: string, context: Partial<ErrorContext> = {}) {
    super(message, code, {
      category: 'STATE_MACHINE',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'StateMachineError';
  }
}

export class InvalidTransitionError extends StateMachineError {
  constructor(fromState: string, toState: string, context: Partial<ErrorContext> = {}) {
    super(`Invalid state transition: ${fromState} -> ${toState}`, 'E5001', {
      severity: 'MEDIUM',
      retryable: false,
      ...context,
    });
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends ChatscribeError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E6001', {
      category: 'CONFIGURATION',
      severity: 'CRITICAL',
      retryable: false,
      ...context,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Helper to check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ChatscribeError) {
    return error.context.retryable;
  }
  return false;
}

/**
 * Helper to wrap unknown errors
 */
export function wrapError(error: unknown, context: Partial<ErrorContext> = {}): ChatscribeError {
  if (error instanceof ChatscribeError) {
    return error;
  }

  if (error instanceof Error) {
    return new ChatscribeError(error.message, 'E9999', {
      category: 'UNKNOWN',
      severity: 'MEDIUM',
      retryable: false,
      originalError: error.name,
      ...context,
    });
  }

  return new ChatscribeError(String(error), 'E9999', {
    category: 'UNKNOWN',
    severity: 'MEDIUM',
    retryable: false,
    ...context,
  });
}
