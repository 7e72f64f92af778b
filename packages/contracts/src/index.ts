/**
 * @fileoverview Main entry point for @ibhist/contracts.
 *
 * @module @ibhist/contracts
 */

// Timeframes
export {
  TIMEFRAMES,
  TimeframeCategory,
  isValidTimeframe,
  parseTimeframe,
  getTimeframeCategory,
  isIntradayTimeframe,
  getAllTimeframes,
} from './timeframes.js';
export type { Timeframe } from './timeframes.js';

// Durations
export { createDuration, parseDuration, formatDuration, isDurationUnit } from './duration.js';
export type { Duration, DurationUnit } from './duration.js';

// Request, bar and provider types
export { WHAT_TO_SHOW_VALUES, SECURITY_TYPES } from './market.js';
export type {
  SessionMode,
  ResolutionMode,
  RequestWindow,
  ResolvedRequest,
  WhatToShow,
  RequestEnvelope,
  SecurityType,
  InstrumentSpec,
  QualifiedInstrument,
  RawTimestamp,
  ProviderBar,
  OutputRow,
  HistoricalBarsProvider,
} from './market.js';

// Error classes and guards
export {
  IbHistError,
  InvalidDateFormatError,
  InvalidRangeError,
  InvalidDurationError,
  InvalidTimeframeError,
  UnparseableTimestampError,
  ProviderError,
  OutputWriteError,
  ConfigError,
  isIbHistError,
  isInputError,
  isProviderError,
  isOutputWriteError,
} from './errors.js';
export type { ProviderErrorKind } from './errors.js';
