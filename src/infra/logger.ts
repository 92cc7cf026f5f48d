import winston from 'winston';
import type { Env } from './env.js';

/**
 * Structured logger with secret redaction.
 * Logs to stderr so stdout stays free for exported data; adds a JSON file in production.
 */

const SECRET_PATTERNS = [
  /password[=:]\s*["']?([^"'\s]+)/gi,
  /api[_-]?key[=:]\s*["']?([^"'\s]+)/gi,
  /token[=:]\s*["']?([^"'\s]+)/gi,
];

const SECRET_FIELDS = ['password', 'apiKey', 'token', 'secret'];
const REDACTED = '***REDACTED***';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Redacts sensitive information from log messages
 */
export function redactSecrets(obj: unknown): unknown {
  if (typeof obj === 'string') {
    let redacted = obj;
    SECRET_PATTERNS.forEach((pattern) => {
      redacted = redacted.replace(pattern, (match: string, secret: string) => {
        return match.replace(secret, REDACTED);
      });
    });
    return redacted;
  }

  if (Array.isArray(obj)) {
    return obj.map(redactSecrets);
  }

  // Errors and dates keep their own shape
  if (isPlainObject(obj)) {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (SECRET_FIELDS.includes(key)) {
        redacted[key] = REDACTED;
      } else {
        redacted[key] = redactSecrets(value);
      }
    }
    return redacted;
  }

  return obj;
}

/** Metadata arrives as top-level fields of `info` */
const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key === 'level') {
      continue;
    }
    info[key] = SECRET_FIELDS.includes(key) ? REDACTED : redactSecrets(info[key]);
  }
  return info;
})();

export type LoggerOptions = Pick<Env, 'NODE_ENV' | 'LOG_LEVEL' | 'LOG_FILE'>;

/**
 * Creates a Winston logger instance
 */
export function createLogger(env: LoggerOptions): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'debug'],
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
        })
      ),
    }),
  ];

  if (env.NODE_ENV === 'production' && env.LOG_FILE) {
    transports.push(
      new winston.transports.File({
        filename: env.LOG_FILE,
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      })
    );
  }

  return winston.createLogger({
    level: env.LOG_LEVEL,
    format: winston.format.combine(
      redactFormat,
      winston.format.errors({ stack: true }),
      winston.format.timestamp(),
      winston.format.json()
    ),
    transports,
    exitOnError: false,
  });
}

/**
 * Shared logger. Starts quiet (warnings and errors only) until the host calls setLogger.
 */
export let logger: winston.Logger = createLogger({ NODE_ENV: 'development', LOG_LEVEL: 'warn' });

export function setLogger(instance: winston.Logger): void {
  logger = instance;
}
