/**
 * @fileoverview Custom winston formats for @ibhist/logger
 * Secret redaction, standard fields and the single-line console format.
 */

import winston from 'winston';

const { format } = winston;

/**
 * Field names whose values never reach a log line. Matching is case-insensitive.
 * Covers connection credentials and account identifiers that may end up in
 * configuration dumps.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /token/i,
  /api[_-]?key/i,
  /authorization/i,
  /^account(_?id)?$/i,
];

const REDACTED = '[REDACTED]';

/** Winston's own fields; never redacted. */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label', 'stack']);

/**
 * True when a field name matches a sensitive pattern.
 *
 * @example
 * ```typescript
 * isSensitiveKey('apiKey')   // true
 * isSensitiveKey('symbol')   // false
 * ```
 */
export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of `value` with sensitive keys replaced, at any depth.
 * Error instances are passed through untouched.
 */
export function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item));
  }
  if (value === null || typeof value !== 'object' || value instanceof Error) {
    return value;
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    redacted[key] = isSensitiveKey(key) ? REDACTED : redactValue(nested);
  }
  return redacted;
}

/**
 * Winston format that redacts sensitive metadata. Must run first in the chain.
 *
 * @example
 * ```typescript
 * logger.info('Connecting', { host: '127.0.0.1', password: 'test-secret' });
 * // {"level":"info","message":"Connecting","host":"127.0.0.1","password":"[REDACTED]"}
 * ```
 */
export const redactSecrets = format((info) => {
  const redacted = { ...info };

  for (const key of Object.keys(redacted)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    redacted[key] = isSensitiveKey(key) ? REDACTED : redactValue(redacted[key]);
  }

  return redacted;
});

/**
 * ISO timestamp plus stack capture for Error messages.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

/**
 * Human-readable single-line output for terminals.
 *
 * @example
 * ```typescript
 * // [2025-01-15T14:30:00.000+00:00] info: Contract qualified component=provider symbol=SPY conId=756733
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, symbol, timeframe, run_id, ...rest } = info;

    const context: string[] = [];
    if (component) context.push(`component=${String(component)}`);
    if (symbol) context.push(`symbol=${String(symbol)}`);
    if (timeframe) context.push(`timeframe="${String(timeframe)}"`);
    if (run_id) context.push(`run_id=${String(run_id)}`);

    for (const [key, value] of Object.entries(rest)) {
      if (key === 'stack' || key === 'splat') {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    const stack = info['stack'];
    return typeof stack === 'string' ? `${baseMsg}\n${stack}` : baseMsg;
  })
);
