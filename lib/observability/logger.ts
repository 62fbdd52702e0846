/**
 * Structured logging for clipstash
 *
 * Stdout belongs to command output, so every log line goes to stderr as
 * JSON. The default level is quiet enough that a normal invocation prints
 * nothing; raise it with LOG_LEVEL=debug when diagnosing a store.
 */

import pino from 'pino';
import { z } from 'zod';

// ========================================
// Environment Detection
// ========================================

const isTest = process.env.NODE_ENV === 'test';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export const logLevelSchema = z.enum(LOG_LEVELS);

// ========================================
// Logger Configuration
// ========================================

// An unknown LOG_LEVEL is left for loadConfig to report
const getLogLevel = (): string => {
  const configured = logLevelSchema.safeParse(process.env.LOG_LEVEL);
  if (configured.success) {
    return configured.data;
  }

  if (isTest) return 'error';
  return 'warn';
};

// Clipboard text can hold anything the user copied
const redactPaths = [
  'content',
  'password',
  'secret',
  'token',
  '*.content',
  '*.password',
  'entry.content',
];

export const logger = pino(
  {
    name: 'clipstash',
    level: getLogLevel(),

    base: {
      pid: process.pid,
    },

    redact: {
      paths: redactPaths,
      censor: '[REDACTED]',
      remove: false,
    },

    timestamp: pino.stdTimeFunctions.isoTime,

    formatters: {
      level: (label) => {
        return { level: label };
      },
    },

    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  },
  pino.destination({ dest: 2, sync: true })
);

// ========================================
// Specialized Loggers
// ========================================

/**
 * Log database operations with performance tracking
 *
 * @example
 * logDatabaseOperation('INSERT', 'clips', 3, true);
 */
export function logDatabaseOperation(
  operation: string,
  table: string,
  duration: number,
  success: boolean,
  error?: unknown
) {
  const logData = {
    type: 'DATABASE_OPERATION',
    operation,
    table,
    duration_ms: duration,
    success,
  };

  if (!success && error) {
    logger.error({ ...logData, error }, `Database error: ${operation} on ${table}`);
  } else if (duration > 1000) {
    logger.warn(logData, `Slow database query: ${operation} on ${table}`);
  } else {
    logger.debug(logData, `Database operation: ${operation} on ${table}`);
  }
}

// ========================================
// Helper Functions
// ========================================

/**
 * Log an error with full stack trace and context
 */
export function logError(
  message: string,
  error: unknown,
  context?: Record<string, unknown>
) {
  logger.error({
    msg: message,
    err: error instanceof Error ? error : new Error(String(error)),
    ...context,
  });
}

/**
 * Create a performance timer
 */
export function startTimer() {
  const start = Date.now();

  return {
    elapsed: () => Date.now() - start,
  };
}

// ========================================
// Structured Logging API
// ========================================

export const log = {
  debug: (message: string, data?: Record<string, unknown>) => logger.debug(data, message),
  info: (message: string, data?: Record<string, unknown>) => logger.info(data, message),
  warn: (message: string, data?: Record<string, unknown>) => logger.warn(data, message),

  database: logDatabaseOperation,
};
