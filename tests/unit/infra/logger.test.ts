import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Writable } from 'node:stream';
import { describe, it, expect, vi } from 'vitest';
import winston from 'winston';
import { createLogger, redactSecrets } from '../../../src/infra/logger.js';

describe('redactSecrets', () => {
  it('should redact secrets inside strings', () => {
    expect(redactSecrets('login password=test-secret ok')).toBe('login password=***REDACTED*** ok');
  });

  it('should redact secret fields in nested objects', () => {
    expect(redactSecrets({ user: 'me', nested: [{ token: 'test-token' }] })).toEqual({
      user: 'me',
      nested: [{ token: '***REDACTED***' }],
    });
  });

  it('should leave other values alone', () => {
    expect(redactSecrets(42)).toBe(42);
    expect(redactSecrets(null)).toBeNull();
    const when = new Date(2024, 0, 1);
    expect(redactSecrets(when)).toBe(when);
  });
});

describe('createLogger', () => {
  it('should use the configured level', () => {
    const logger = createLogger({ NODE_ENV: 'test', LOG_LEVEL: 'error' });

    expect(logger.level).toBe('error');
    expect(logger.transports).toHaveLength(1);
  });

  it('should add a file transport in production', () => {
    const logger = createLogger({ NODE_ENV: 'production', LOG_LEVEL: 'info', LOG_FILE: join(tmpdir(), 'moneymoney-test.log') });

    expect(logger.transports).toHaveLength(2);
    logger.close();
  });

  it('should redact secrets passed as log metadata', async () => {
    const lines: string[] = [];
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        lines.push(chunk.toString());
        callback();
      },
    });
    const logger = createLogger({ NODE_ENV: 'test', LOG_LEVEL: 'info' });
    logger.clear().add(new winston.transports.Stream({ stream }));

    logger.info('login token=abc123', { token: 'abc123', user: 'me', note: 'password=test-secret' });

    await vi.waitFor(() => expect(lines).toHaveLength(1));
    const entry: unknown = JSON.parse(lines[0] ?? '');
    expect(entry).toMatchObject({
      level: 'info',
      message: 'login token=***REDACTED***',
      token: '***REDACTED***',
      user: 'me',
      note: 'password=***REDACTED***',
    });
  });
});
