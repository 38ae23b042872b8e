import { BaseError, StorageError } from '@tally/shared/Types/errors.js';

/**
 * Base error for arithmetic failures. No log entry is written for these.
 */
export class ArithmeticError extends BaseError {
  constructor(message: string, code: string, details?: unknown) {
    super(message, code, details);
    this.name = 'ArithmeticError';
  }
}

export class DivisionByZeroError extends ArithmeticError {
  constructor(details?: unknown) {
    super('Division by zero! Please try again.', 'DIVISION_BY_ZERO', details);
    this.name = 'DivisionByZeroError';
  }
}

/**
 * The result left the finite double range
 */
export class OverflowDetectedError extends ArithmeticError {
  constructor(details?: unknown) {
    super('Number too big in magnitude! Please try again.', 'OVERFLOW_DETECTED', details);
    this.name = 'OverflowDetectedError';
  }
}

/**
 * The log file exists but cannot be read or written
 */
export class LogUnavailableError extends StorageError {
  constructor(message: string, details?: unknown) {
    super(message, 'LOG_UNAVAILABLE', details);
    this.name = 'LogUnavailableError';
  }
}

/**
 * A LogStore operation was called in a state that does not allow it
 */
export class LogStateError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'LOG_STATE_ERROR', details);
    this.name = 'LogStateError';
  }
}
