/**
 * @fileoverview Public API for @ibhist/logger
 */

export { createLogger, createChildLogger } from './createLogger.js';

export { attachGlobalHandlers, flushAndExit, INTERRUPT_EXIT_CODE } from './errorHandler.js';
export type { GlobalHandlerOptions } from './errorHandler.js';

export { startTimer } from './perf-timer.js';
export type { PerfTimer } from './perf-timer.js';

export { redactSecrets, redactValue, isSensitiveKey } from './formats.js';

export type { Logger, LoggerConfig, LogLevel, LogEntry, ChildLoggerContext } from './types.js';
