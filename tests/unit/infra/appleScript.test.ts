import { describe, it, expect, vi } from 'vitest';
import {
  MoneyMoneyError,
  MoneyMoneyLockedError,
  MoneyMoneyTimeoutError,
  isTransientMoneyMoneyError,
} from '../../../src/domain/errors.js';
import { classifyFailure, createAppleScriptRunner, quoteAppleScript } from '../../../src/infra/appleScript.js';

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../src/infra/logger.js', () => loggerMock);

describe('quoteAppleScript', () => {
  it('should escape quotes and backslashes', () => {
    expect(quoteAppleScript('plain')).toBe('"plain"');
    expect(quoteAppleScript('say "hi"')).toBe('"say \\"hi\\""');
    expect(quoteAppleScript('C:\\path')).toBe('"C:\\\\path"');
  });
});

describe('classifyFailure', () => {
  it('should detect a locked database from stderr', () => {
    const error = classifyFailure(
      Object.assign(new Error('Command failed'), { stderr: 'execution error: Locked database. (-2700)\n' }),
      5000
    );

    expect(error).toBeInstanceOf(MoneyMoneyLockedError);
    expect(error.code).toBe('MONEYMONEY_LOCKED');
    expect(isTransientMoneyMoneyError(error)).toBe(true);
  });

  it('should detect a killed process as a timeout', () => {
    const error = classifyFailure(Object.assign(new Error('Command failed'), { killed: true, stderr: '' }), 5000);

    expect(error).toBeInstanceOf(MoneyMoneyTimeoutError);
    expect(error.message).toBe('MoneyMoney did not answer within 5000ms');
    expect(isTransientMoneyMoneyError(error)).toBe(true);
  });

  it('should treat everything else as a hard failure', () => {
    const error = classifyFailure(
      Object.assign(new Error('Command failed'), { stderr: "execution error: MoneyMoney got an error: Can't get account. (-1728)" }),
      5000
    );

    expect(error).toBeInstanceOf(MoneyMoneyError);
    expect(error.code).toBe('MONEYMONEY_ERROR');
    expect(error.message).toBe("AppleScript error: execution error: MoneyMoney got an error: Can't get account. (-1728)");
    expect(isTransientMoneyMoneyError(error)).toBe(false);
  });

  it('should fall back to the error message without stderr', () => {
    expect(classifyFailure(new Error('spawn osascript ENOENT'), 5000).message).toBe(
      'AppleScript error: spawn osascript ENOENT'
    );
  });
});

// node stands in for osascript: both take a script after -e
describe('createAppleScriptRunner', () => {
  const run = (timeoutMs = 10000) => createAppleScriptRunner({ osascriptPath: process.execPath, timeoutMs });

  it('should return stdout', async () => {
    await expect(run()('process.stdout.write("<plist/>")')).resolves.toBe('<plist/>');
  });

  it('should classify stderr of a failed run', async () => {
    await expect(run()('process.stderr.write("Locked database"); process.exit(1)')).rejects.toBeInstanceOf(
      MoneyMoneyLockedError
    );
  });

  it('should stop scripts that run too long', async () => {
    await expect(run(200)('setTimeout(() => {}, 5000)')).rejects.toBeInstanceOf(MoneyMoneyTimeoutError);
  });
});
