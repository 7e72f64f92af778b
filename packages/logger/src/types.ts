/**
 * @fileoverview Type definitions for @ibhist/logger
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity written by a logger.
 * - 'error': the run failed
 * - 'warn': degraded or risky request (data availability, unparsed rows)
 * - 'info': progress of a normal run
 * - 'debug': request envelopes, timings, provider chatter
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: false,
 *   filePath: './logs/ibhist.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level: LogLevel;

  /**
   * Machine-readable JSON lines instead of the coloured single-line format.
   * @default true in production, false otherwise
   */
  json?: boolean;

  /**
   * Also append log lines to this file.
   * @example './logs/ibhist.log'
   */
  filePath?: string;

  /**
   * Write to the console.
   * @default true
   */
  console?: boolean;

  /**
   * Extra destination stream. Used by tests to capture output in memory.
   */
  stream?: NodeJS.WritableStream;

  /**
   * Fields attached to every entry (e.g. `{ run_id }`).
   */
  defaultMeta?: Record<string, unknown>;
}

/**
 * Structured log entry with the fields this project logs routinely.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;

  /** Instrument symbol (e.g. "SPY", "EURUSD") */
  symbol?: string;

  /** Bar size label (e.g. "1 min", "1 day") */
  timeframe?: string;

  /** Identifier of one CLI invocation */
  run_id?: string;

  /** Component name (typically from a child logger) */
  component?: string;

  /** Data provider name ("ibkr", "fixture") */
  provider?: string;

  /** Operation duration in milliseconds */
  duration_ms?: number;

  /** Operation name */
  operation?: string;

  /** Error code when an operation failed */
  error_code?: string;

  /** Number of bars or rows processed */
  count?: number;

  /** Output file path */
  path?: string;

  [key: string]: unknown;
}

/**
 * Fields a child logger stamps on every entry.
 */
export interface ChildLoggerContext {
  component?: string;
  symbol?: string;
  timeframe?: string;
  provider?: string;
  operation?: string;
  [key: string]: unknown;
}

/**
 * Winston's logger interface (info(), warn(), error(), debug(), child()).
 */
export type Logger = WinstonLogger;
