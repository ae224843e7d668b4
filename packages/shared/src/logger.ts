/**
 * Structured Logging with Correlation IDs
 *
 * One JSON object per line. Every entry carries the run's correlation ID and,
 * while a document is being processed, its document ID.
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isThreshold(value: string): value is LogLevel | 'silent' {
  return value in LEVEL_ORDER;
}

function threshold(): number {
  const configured = (process.env.LOG_LEVEL || '').toLowerCase();
  if (isThreshold(configured)) {
    return LEVEL_ORDER[configured];
  }
  return process.env.NODE_ENV === 'production' ? LEVEL_ORDER.info : LEVEL_ORDER.debug;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= threshold();
}

export function formatLog(level: LogLevel, message: string, context?: LogContext): string {
  const correlationId = getCorrelationId();
  const timestamp = new Date().toISOString();
  const runContext = getContext();

  const logEntry = {
    timestamp,
    level: level.toUpperCase(),
    correlationId,
    documentId: runContext?.documentId,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

export function serializeError(error: unknown): LogContext | string {
  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack,
      name: error.name,
    };
  }
  return String(error);
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    if (enabled('info')) {
      console.log(formatLog('info', message, context));
    }
  },

  warn: (message: string, context?: LogContext) => {
    if (enabled('warn')) {
      console.warn(formatLog('warn', message, context));
    }
  },

  error: (message: string, error?: unknown, context?: LogContext) => {
    if (enabled('error')) {
      console.error(formatLog('error', message, { ...context, error: serializeError(error) }));
    }
  },

  debug: (message: string, context?: LogContext) => {
    if (enabled('debug')) {
      console.debug(formatLog('debug', message, context));
    }
  },
};
