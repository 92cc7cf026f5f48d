/**
 * Error types raised by the MoneyMoney client.
 * Each error carries a stable code so callers can branch without parsing messages.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * MoneyMoney rejected or failed an automation request
 */
export class MoneyMoneyError extends AppError {
  constructor(message: string, details?: unknown, code = 'MONEYMONEY_ERROR') {
    super(message, code, details);
  }
}

/**
 * MoneyMoney is running but its database is locked (the user has not unlocked it yet)
 */
export class MoneyMoneyLockedError extends MoneyMoneyError {
  constructor(details?: unknown) {
    super('MoneyMoney database is locked', details, 'MONEYMONEY_LOCKED');
  }
}

/**
 * The automation round-trip did not finish within the configured timeout
 */
export class MoneyMoneyTimeoutError extends MoneyMoneyError {
  constructor(timeoutMs: number, details?: unknown) {
    super(`MoneyMoney did not answer within ${timeoutMs}ms`, details, 'MONEYMONEY_TIMEOUT');
  }
}

/**
 * Field name outside an entity's declared attributes
 */
export class UnknownAttributeError extends AppError {
  constructor(
    public readonly entity: string,
    public readonly attribute: string
  ) {
    super(`${entity} has no attribute "${attribute}"`, 'UNKNOWN_ATTRIBUTE', { entity, attribute });
  }
}

/**
 * Write attempted on a field that can only be read
 */
export class ReadOnlyFieldError extends AppError {
  constructor(entity: string, field: string) {
    super(`${entity}.${field} is read-only`, 'READ_ONLY_FIELD', { entity, field });
  }
}

/**
 * Field the transport does not know how to write
 */
export class UnsupportedFieldError extends AppError {
  constructor(field: string) {
    super(`Field "${field}" cannot be changed through MoneyMoney`, 'UNSUPPORTED_FIELD', { field });
  }
}

/**
 * Tag that cannot be written back into a comment
 */
export class InvalidTagError extends AppError {
  constructor(tag: string) {
    super(`Invalid tag "${tag}": tags must be non-empty and must not contain ">"`, 'INVALID_TAG', {
      tag,
    });
  }
}

/**
 * Invalid input from the caller
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} with id ${id} not found`, 'NOT_FOUND', { resource, id });
  }
}

/**
 * Configuration errors - fail fast before talking to MoneyMoney
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', details);
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Failures worth skipping rather than failing on: the app is locked or slow to answer.
 */
export function isTransientMoneyMoneyError(error: unknown): boolean {
  return error instanceof MoneyMoneyLockedError || error instanceof MoneyMoneyTimeoutError;
}
