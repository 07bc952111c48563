/**
 * Structured Logging with Correlation IDs
 *
 * JSON-lines logger. Every entry carries the correlation ID and document ID of
 * the AsyncLocalStorage context it was written in. Components that log take a
 * `Logger` so callers and tests can hand in their own sink.
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

export interface Logger {
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}

function formatLog(level: string, message: string, context?: LogContext): string {
  const reqContext = getContext();

  const logEntry = {
    timestamp: new Date().toISOString(),
    level,
    correlationId: getCorrelationId(),
    documentId: reqContext?.documentId,
    sourceFilename: reqContext?.sourceFilename,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

function describeError(error: unknown): unknown {
  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack,
      name: error.name,
    };
  }
  return String(error);
}

/** Receives one formatted JSON line */
export type LogWriter = (line: string) => void;

/**
 * Create a logger. Without a writer each level goes to its console method;
 * with one, every line goes to the writer (the CLI keeps stdout for results).
 */
export function createLogger(write?: LogWriter): Logger {
  const out = (consoleMethod: LogWriter) => write ?? consoleMethod;

  return {
    info: (message, context) => {
      out(console.log)(formatLog('INFO', message, context));
    },

    warn: (message, context) => {
      out(console.warn)(formatLog('WARN', message, context));
    },

    error: (message, error, context) => {
      out(console.error)(formatLog('ERROR', message, { ...context, error: describeError(error) }));
    },

    debug: (message, context) => {
      if (process.env.LOG_LEVEL === 'debug' || process.env.NODE_ENV !== 'production') {
        out(console.debug)(formatLog('DEBUG', message, context));
      }
    },
  };
}

export const logger: Logger = createLogger();

/**
 * Logger that drops every entry. Handy for library callers that want the
 * engine quiet.
 */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};
