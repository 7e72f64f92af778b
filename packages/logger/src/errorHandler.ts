/**
 * @fileoverview Process-level handlers for uncaught errors and interrupts
 * Logs the failure, flushes transports, then exits.
 */

import type { Logger } from './types.js';

/**
 * How long to wait for transports to flush before forcing exit.
 */
const FLUSH_TIMEOUT_MS = 3000;

/** Conventional exit code for a process stopped by SIGINT. */
export const INTERRUPT_EXIT_CODE = 130;

export interface GlobalHandlerOptions {
  /**
   * Exit hook. Defaults to flushing the logger and calling process.exit.
   */
  exit?: (code: number) => void;
}

let detachCurrent: (() => void) | null = null;

/**
 * Registers handlers for uncaughtException, unhandledRejection and SIGINT.
 *
 * Fail fast: after an uncaught error the process exits with code 1. An
 * interrupt (Ctrl+C during the connection or at the overwrite prompt) is
 * logged as a user cancellation and exits with 130.
 *
 * Calling again while handlers are attached logs a warning and returns the
 * existing detach function.
 *
 * @returns Function removing the handlers
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger, options: GlobalHandlerOptions = {}): () => void {
  if (detachCurrent) {
    logger.warn('Global error handlers already attached, skipping');
    return detachCurrent;
  }

  const exit = options.exit ?? ((code: number) => flushAndExit(logger, code));

  const uncaughtExceptionHandler = (error: Error): void => {
    logger.error('Uncaught exception, exiting', {
      error: { name: error.name, message: error.message, stack: error.stack },
      event: 'uncaughtException',
      fatal: true,
    });
    exit(1);
  };

  const unhandledRejectionHandler = (reason: unknown): void => {
    const errorInfo =
      reason instanceof Error
        ? { name: reason.name, message: reason.message, stack: reason.stack }
        : { message: String(reason) };

    logger.error('Unhandled promise rejection, exiting', {
      error: errorInfo,
      event: 'unhandledRejection',
      fatal: true,
    });
    exit(1);
  };

  const interruptHandler = (): void => {
    logger.warn('Operation cancelled by user', { event: 'SIGINT' });
    exit(INTERRUPT_EXIT_CODE);
  };

  process.on('uncaughtException', uncaughtExceptionHandler);
  process.on('unhandledRejection', unhandledRejectionHandler);
  process.on('SIGINT', interruptHandler);

  const detach = (): void => {
    process.off('uncaughtException', uncaughtExceptionHandler);
    process.off('unhandledRejection', unhandledRejectionHandler);
    process.off('SIGINT', interruptHandler);
    detachCurrent = null;
  };
  detachCurrent = detach;

  logger.debug('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection', 'SIGINT'],
  });

  return detach;
}

/**
 * Ends the logger and exits once transports finish, or after FLUSH_TIMEOUT_MS.
 */
export function flushAndExit(logger: Logger, exitCode: number): void {
  const timeoutId = setTimeout(() => {
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    process.exit(exitCode);
  });

  logger.end();
}
