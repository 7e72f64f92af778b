/**
 * @fileoverview Tests for secret redaction
 */

import { describe, it, expect } from 'vitest';
import { Writable } from 'node:stream';
import { createLogger } from '../src/createLogger.js';
import { isSensitiveKey, redactValue } from '../src/formats.js';

describe('isSensitiveKey', () => {
  it('should match credential-like names', () => {
    expect(isSensitiveKey('password')).toBe(true);
    expect(isSensitiveKey('PASSWD')).toBe(true);
    expect(isSensitiveKey('apiKey')).toBe(true);
    expect(isSensitiveKey('api_key')).toBe(true);
    expect(isSensitiveKey('sessionToken')).toBe(true);
    expect(isSensitiveKey('account')).toBe(true);
    expect(isSensitiveKey('accountId')).toBe(true);
  });

  it('should leave domain fields alone', () => {
    expect(isSensitiveKey('symbol')).toBe(false);
    expect(isSensitiveKey('host')).toBe(false);
    expect(isSensitiveKey('clientId')).toBe(false);
    expect(isSensitiveKey('accountSummary')).toBe(false);
  });
});

describe('redactValue', () => {
  it('should redact nested keys and arrays', () => {
    const input = {
      connection: { host: '127.0.0.1', password: 'test-secret' },
      tokens: ['a', 'b'],
      items: [{ secret: 'x', name: 'y' }],
    };

    expect(redactValue(input)).toEqual({
      connection: { host: '127.0.0.1', password: '[REDACTED]' },
      tokens: '[REDACTED]',
      items: [{ secret: '[REDACTED]', name: 'y' }],
    });
  });

  it('should not mutate the input', () => {
    const input = { password: 'test-secret' };
    redactValue(input);
    expect(input.password).toBe('test-secret');
  });

  it('should pass primitives and errors through', () => {
    const error = new Error('boom');
    expect(redactValue(42)).toBe(42);
    expect(redactValue(null)).toBeNull();
    expect(redactValue(error)).toBe(error);
  });
});

describe('logger redaction', () => {
  it('should redact secrets before output', async () => {
    const lines: string[] = [];
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        lines.push(chunk.toString().trim());
        callback();
      },
    });
    const logger = createLogger({ level: 'info', json: true, console: false, stream });

    logger.info('Connecting', { host: '127.0.0.1', password: 'test-secret', config: { apiKey: 'test-key' } });
    await new Promise((resolve) => setTimeout(resolve, 50));

    const entry = JSON.parse(lines[0] ?? '{}');
    expect(entry.host).toBe('127.0.0.1');
    expect(entry.password).toBe('[REDACTED]');
    expect(entry.config).toEqual({ apiKey: '[REDACTED]' });
  });
});
