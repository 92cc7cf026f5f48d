import { describe, it, expect } from 'vitest';
import { ConfigError } from '../../../src/domain/errors.js';
import { validateEnv } from '../../../src/infra/env.js';

describe('validateEnv', () => {
  it('should apply defaults', () => {
    expect(validateEnv({})).toEqual({
      NODE_ENV: 'development',
      MONEYMONEY_APP_NAME: 'MoneyMoney',
      MONEYMONEY_TIMEOUT_MS: 60000,
      OSASCRIPT_PATH: 'osascript',
      LOG_LEVEL: 'info',
    });
  });

  it('should coerce numeric settings', () => {
    const env = validateEnv({ MONEYMONEY_TIMEOUT_MS: '15000', LOG_LEVEL: 'debug', LOG_FILE: '/tmp/mm.log' });

    expect(env.MONEYMONEY_TIMEOUT_MS).toBe(15000);
    expect(env.LOG_LEVEL).toBe('debug');
    expect(env.LOG_FILE).toBe('/tmp/mm.log');
  });

  it('should list every invalid variable', () => {
    let caught: unknown;
    try {
      validateEnv({ MONEYMONEY_TIMEOUT_MS: '10', LOG_LEVEL: 'verbose' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const message = caught instanceof Error ? caught.message : '';
    expect(message).toContain('MONEYMONEY_TIMEOUT_MS: MONEYMONEY_TIMEOUT_MS must be at least 1000');
    expect(message).toContain('LOG_LEVEL:');
  });
});
