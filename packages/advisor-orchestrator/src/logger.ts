/**
 * Structured logging using Pino, exposed through the ILogger contract.
 */

import pino from 'pino';
import type { ILogger, LogLevel, LogMeta } from '@field-advisor/advisor-contracts';

export interface CreateLoggerOptions {
  level?: LogLevel;
  /** Defaults to stdout */
  destination?: pino.DestinationStream;
}

/**
 * Wrap a pino logger; metadata goes into the structured record.
 */
export function fromPino(base: pino.Logger): ILogger {
  const write =
    (level: 'debug' | 'info' | 'warn' | 'error') =>
    (message: string, meta?: LogMeta): void => {
      if (meta) {
        base[level](meta, message);
      } else {
        base[level](message);
      }
    };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}

export function createLogger(name: string, options: CreateLoggerOptions = {}): ILogger {
  const opts: pino.LoggerOptions = {
    name,
    level: options.level ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  return fromPino(options.destination ? pino(opts, options.destination) : pino(opts));
}
