/**
 * Base error class for every Tally package.
 * Carries a machine-readable code next to the human message.
 */
export class BaseError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'BaseError';
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Invalid environment or configuration values
 */
export class ConfigurationError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * User-supplied values that fail a domain rule
 */
export class ValidationError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * Reading or writing a persisted file failed
 */
export class StorageError extends BaseError {
  constructor(message: string, code: string = 'STORAGE_ERROR', details?: unknown) {
    super(message, code, details);
    this.name = 'StorageError';
  }
}
