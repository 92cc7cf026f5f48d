import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { MoneyMoneyError, MoneyMoneyLockedError, MoneyMoneyTimeoutError } from '../domain/errors.js';
import { logger } from './logger.js';

const execFileAsync = promisify(execFile);

/** Exports of large accounts easily exceed the 1MB default */
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

const LOCKED_PATTERN = /locked database/i;

export interface AppleScriptOptions {
  osascriptPath: string;
  timeoutMs: number;
}

export type AppleScriptRunner = (script: string) => Promise<string>;

/**
 * Quotes a value as an AppleScript string literal
 */
export function quoteAppleScript(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Runs AppleScript through osascript and returns its stdout.
 * Locked databases and timeouts get their own error types so callers can decide to skip.
 */
export function createAppleScriptRunner(options: AppleScriptOptions): AppleScriptRunner {
  return async (script: string) => {
    try {
      const { stdout } = await execFileAsync(options.osascriptPath, ['-e', script], {
        timeout: options.timeoutMs,
        maxBuffer: MAX_OUTPUT_BYTES,
        encoding: 'utf8',
      });
      return stdout;
    } catch (error) {
      throw classifyFailure(error, options.timeoutMs);
    }
  };
}

export function classifyFailure(error: unknown, timeoutMs: number): MoneyMoneyError {
  const stderr = readStringField(error, 'stderr');
  const message = stderr.trim() || (error instanceof Error ? error.message : String(error));

  if (isRecord(error) && error.killed === true) {
    logger.warn('AppleScript timed out', { timeoutMs });
    return new MoneyMoneyTimeoutError(timeoutMs, { error: message });
  }

  if (LOCKED_PATTERN.test(message)) {
    return new MoneyMoneyLockedError({ error: message });
  }

  logger.error('AppleScript failed', { error: message });
  return new MoneyMoneyError(`AppleScript error: ${message}`, { error: message });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readStringField(value: unknown, field: string): string {
  if (!isRecord(value)) {
    return '';
  }
  const fieldValue = value[field];
  return typeof fieldValue === 'string' ? fieldValue : '';
}
