/**
 * @fileoverview Logger factory for ibhist
 * Creates winston loggers with redaction, standard fields and optional file
 * and stream transports.
 */

import winston from 'winston';
import type { LoggerConfig, Logger, ChildLoggerContext } from './types.js';
import { redactSecrets, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * Format chain: redact secrets, add timestamp and error stacks, then JSON or
 * pretty-print.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: false });
 * logger.info('Requesting historical data', { symbol: 'SPY', timeframe: '1 min' });
 * ```
 *
 * @example
 * ```typescript
 * // Per-run logger with a file copy
 * const logger = createLogger({
 *   level: 'debug',
 *   filePath: './logs/ibhist.log',
 *   defaultMeta: { run_id: 'run-20250115-143000' },
 * });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    stream,
    defaultMeta,
  } = config;

  const logFormat = winston.format.combine(redactSecrets(), standardFields, json ? winston.format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(new winston.transports.Console({ level, format: logFormat }));
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: logFormat,
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  if (stream) {
    transports.push(new winston.transports.Stream({ stream, level, format: logFormat }));
  }

  // Winston warns when a logger has no transports; keep a silent sink instead.
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ level, silent: true }));
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    defaultMeta,
    // Fatal errors are handled by attachGlobalHandlers
    exitOnError: false,
  });
}

/**
 * Creates a child logger that stamps `context` on every entry.
 *
 * @example
 * ```typescript
 * const providerLogger = createChildLogger(logger, { component: 'provider', provider: 'ibkr' });
 * providerLogger.info('Connected'); // includes component and provider
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
