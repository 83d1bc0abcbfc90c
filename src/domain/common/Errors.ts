/**
 * Base application error.
 */
export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: true,
      statusCode: this.statusCode,
      code: this.code,
      message: this.message,
      details: this.details
    };
  }
}

/**
 * Validation error (400).
 * Raised before any storage mutation takes place.
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id?: string | number) {
    const message = id !== undefined ? `${resource} with id '${id}' not found` : `${resource} not found`;
    super(404, 'NOT_FOUND', message);
  }
}

/**
 * Backing store failure (500). Never retried automatically.
 */
export class StorageError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(500, 'STORAGE_ERROR', message, cause !== undefined ? { cause: errorMessage(cause) } : undefined);
  }
}

/**
 * Voice channel join/move failure (502).
 */
export class ConnectionError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(502, 'CONNECTION_ERROR', message, cause !== undefined ? { cause: errorMessage(cause) } : undefined);
  }
}

/**
 * Messaging sink failure (502).
 */
export class DeliveryError extends AppError {
  constructor(message: string, details?: unknown) {
    super(502, 'DELIVERY_ERROR', message, details);
  }
}

/**
 * Configuration error (500).
 */
export class ConfigError extends AppError {
  constructor(message: string) {
    super(500, 'CONFIG_ERROR', message);
  }
}

/**
 * Message of a thrown value. Errors raised by Node built-ins may come from
 * another realm, so this checks the shape rather than the prototype.
 */
export function errorMessage(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}

/**
 * True for a system error carrying the given errno code, e.g. ENOENT.
 */
export function hasErrorCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

/**
 * Normalize an unknown thrown value to an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(errorMessage(err));
}
