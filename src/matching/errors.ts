/**
 * Errors raised by the reconciliation engine.
 *
 * Both are precondition failures detected before any matching starts.
 */

export type ReconciliationErrorCode = 'INVALID_INPUT' | 'INVALID_CONFIGURATION';

export class ReconciliationError extends Error {
  public readonly code: ReconciliationErrorCode;

  constructor(message: string, code: ReconciliationErrorCode) {
    super(message);
    this.name = 'ReconciliationError';
    this.code = code;

    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A dataset is not a list of records, or a record lacks the name field.
 */
export class InvalidInputError extends ReconciliationError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT');
    this.name = 'InvalidInputError';
  }
}

/**
 * A threshold override is not a number in [0, 1].
 */
export class InvalidConfigurationError extends ReconciliationError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIGURATION');
    this.name = 'InvalidConfigurationError';
  }
}
