/**
 * Unit Tests: Logger and secret redaction
 */

import { describe, it, expect, vi } from 'vitest';
import {
  createLogger,
  isLogLevel,
  redactPatterns,
  redactRecord,
  redactString,
} from '../../src/api/logger.js';

describe('redaction', () => {
  it('keeps the ends of long values', () => {
    expect(redactString('u1234-0123456789abcdef')).toBe('u123...cdef');
    expect(redactString('short')).toBe('[REDACTED]');
  });

  it('redacts API keys inside strings', () => {
    expect(redactPatterns('POST api_key=abc123&format=json')).toBe('POST api_...c123&format=json');
    expect(redactPatterns('key u1234-0123456789abcdef used')).toBe('key u123...cdef used');
  });

  it('redacts sensitive keys at any depth', () => {
    expect(
      redactRecord({
        apiKey: 'short',
        httpPassword: '',
        url: 'https://example.com',
        nested: { token: 'abcdefghijkl' },
      })
    ).toEqual({
      apiKey: '[REDACTED]',
      httpPassword: '',
      url: 'https://example.com',
      nested: { token: 'abcd...ijkl' },
    });
  });
});

describe('ApiLogger', () => {
  it('drops entries below its level', () => {
    const output = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = createLogger({ level: 'warn', timestamps: false });

    log.info('hidden');
    log.warn('Slow response', { apiKey: 'u1234-0123456789abcdef' });

    expect(output.mock.calls.map((call) => call[0])).toEqual([
      '[WARN] Slow response {"apiKey":"u123...cdef"}',
    ]);
  });

  it('writes JSON entries', () => {
    const output = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = createLogger({ json: true });

    log.info('hello', { monitors: 2 });

    const entry: unknown = JSON.parse(String(output.mock.calls[0][0]));
    expect(entry).toMatchObject({ level: 'info', message: 'hello', context: { monitors: 2 } });
  });

  it('recognizes level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
