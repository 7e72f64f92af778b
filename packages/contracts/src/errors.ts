/**
 * @fileoverview Error taxonomy for ibhist.
 *
 * Every domain error extends IbHistError and carries:
 * - A machine-readable code
 * - A structured data payload
 * - An ISO timestamp
 *
 * @module @ibhist/contracts/errors
 */

/**
 * Base class for all ibhist errors.
 *
 * @invariant code is a non-empty string
 * @invariant timestamp is a valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new IbHistError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class IbHistError extends Error {
  /** Machine-readable error code (e.g., 'INVALID_RANGE'). */
  readonly code: string;

  /** Structured context for diagnostics. */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 timestamp when the error was created. */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'IbHistError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Error.captureStackTrace?.(this, new.target);
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when a start or end date matches none of the accepted formats.
 *
 * @example
 * ```typescript
 * throw new InvalidDateFormatError('2024/01/15');
 * ```
 */
export class InvalidDateFormatError extends IbHistError {
  static readonly ACCEPTED_FORMATS = ['YYYY-MM-DD', 'YYYY-MM-DD HH:MM', 'YYYY-MM-DD HH:MM:SS'] as const;

  constructor(input: string) {
    super(
      'INVALID_DATE_FORMAT',
      `Invalid date format: ${input}. Use YYYY-MM-DD, YYYY-MM-DD HH:MM or YYYY-MM-DD HH:MM:SS`,
      { input, accepted: [...InvalidDateFormatError.ACCEPTED_FORMATS] }
    );
    this.name = 'InvalidDateFormatError';
  }
}

/**
 * Thrown when both dates parse but the start lies after the end.
 */
export class InvalidRangeError extends IbHistError {
  constructor(start: string, end: string) {
    super('INVALID_RANGE', 'Start date cannot be after end date', { start, end });
    this.name = 'InvalidRangeError';
  }
}

/**
 * Thrown when a duration string does not match `<int> <unit>`.
 */
export class InvalidDurationError extends IbHistError {
  constructor(message: string, data: { input: string; [key: string]: unknown }) {
    super('INVALID_DURATION', message, data);
    this.name = 'InvalidDurationError';
  }
}

/**
 * Thrown when a bar-size label is not in the catalog.
 */
export class InvalidTimeframeError extends IbHistError {
  constructor(message: string, data: { input: string; [key: string]: unknown }) {
    super('INVALID_TIMEFRAME', message, data);
    this.name = 'InvalidTimeframeError';
  }
}

/**
 * Raised for a provider timestamp that cannot be read as UTC or zone-aware.
 *
 * Produced as a row-level warning by timezone conversion rather than thrown;
 * the row keeps its original value.
 */
export class UnparseableTimestampError extends IbHistError {
  constructor(value: string, rowIndex: number) {
    super('UNPARSEABLE_TIMESTAMP', `Timestamp "${value}" in row ${rowIndex} could not be parsed; leaving it as is`, {
      value,
      rowIndex,
    });
    this.name = 'UnparseableTimestampError';
  }
}

/**
 * Provider failure categories.
 */
export type ProviderErrorKind = 'connection' | 'timeout' | 'qualification' | 'request';

/**
 * Thrown when the data provider cannot connect, qualify a contract or serve a
 * request. Surfaced to the caller verbatim; never retried.
 *
 * @example
 * ```typescript
 * throw new ProviderError('timeout', 'Connection to IBKR timed out', {
 *   provider: 'ibkr',
 *   host: '127.0.0.1',
 *   port: 4001
 * });
 * ```
 */
export class ProviderError extends IbHistError {
  readonly kind: ProviderErrorKind;

  constructor(
    kind: ProviderErrorKind,
    message: string,
    data: { provider: string; [key: string]: unknown },
    options?: { cause?: unknown }
  ) {
    super(`PROVIDER_${kind.toUpperCase()}`, message, data);
    this.name = 'ProviderError';
    this.kind = kind;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Thrown when the output file cannot be written. Carries guidance lines for
 * the operator.
 */
export class OutputWriteError extends IbHistError {
  readonly path: string;
  readonly guidance: readonly string[];

  constructor(message: string, data: { path: string; guidance: string[]; errno?: string }, options?: { cause?: unknown }) {
    super('OUTPUT_WRITE_FAILED', message, data);
    this.name = 'OutputWriteError';
    this.path = data.path;
    this.guidance = data.guidance;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Thrown when configuration fails validation.
 */
export class ConfigError extends IbHistError {
  constructor(message: string, data: { issues: string[] }) {
    super('CONFIG_INVALID', message, data);
    this.name = 'ConfigError';
  }
}

/**
 * Type guard for IbHistError instances.
 *
 * @example
 * ```typescript
 * try {
 *   // ...
 * } catch (err) {
 *   if (isIbHistError(err)) {
 *     logger.error(err.message, { error_code: err.code });
 *   }
 * }
 * ```
 */
export function isIbHistError(error: unknown): error is IbHistError {
  return error instanceof IbHistError;
}

/**
 * True for errors caused by user input (dates, durations, timeframes).
 * These abort the run before any provider interaction.
 */
export function isInputError(
  error: unknown
): error is InvalidDateFormatError | InvalidRangeError | InvalidDurationError | InvalidTimeframeError {
  return (
    error instanceof InvalidDateFormatError ||
    error instanceof InvalidRangeError ||
    error instanceof InvalidDurationError ||
    error instanceof InvalidTimeframeError
  );
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

export function isOutputWriteError(error: unknown): error is OutputWriteError {
  return error instanceof OutputWriteError;
}
