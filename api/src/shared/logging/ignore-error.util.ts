import { Logger } from '@nestjs/common';
import { formatError } from './format-error.util';

type LoggerLike = {
  warn?: (message: string) => void;
  debug?: (message: string) => void;
  log?: (message: string) => void;
};

const defaultLogger = new Logger('ignore-error');

const logWithLevel = (
  logger: LoggerLike,
  level: 'warn' | 'debug',
  message: string,
) => {
  const logFn = level === 'debug' ? logger.debug : logger.warn;
  if (typeof logFn === 'function') {
    logFn.call(logger, message);
    return;
  }
  const fallback = logger.log ?? logger.warn ?? logger.debug;
  if (typeof fallback === 'function') {
    fallback.call(logger, message);
  }
};

/**
 * Logs an error on a best-effort path where the caller deliberately carries on.
 * `context` is appended as JSON so the line stays greppable.
 */
export const logIgnoredError = (
  err: unknown,
  message?: string,
  logger?: LoggerLike,
  level: 'warn' | 'debug' = 'warn',
  context?: Record<string, unknown>,
) => {
  const prefix = message ? `${message}: ` : '';
  let suffix = '';
  if (context) {
    try {
      suffix = ` ${JSON.stringify(context)}`;
    } catch {
      suffix = '';
    }
  }
  const line = `${prefix}${formatError(err)}${suffix}`;
  try {
    logWithLevel(logger ?? defaultLogger, level, line);
  } catch {
    // logging must never throw back into the caller
  }
};
