import type { DenialReason } from '../domain/auth/authGate.js';

/**
 * How a caller should treat a rejected request.
 * Failure: an expected negative outcome, safe to show to the end user.
 * Error: misuse or tampering (bad tokens, duplicate accounts).
 */
export type ErrorCategory = 'Failure' | 'Error';

/**
 * Application-level errors for HTTP layer mapping.
 */
export abstract class AccountError extends Error {
  abstract readonly category: ErrorCategory;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends AccountError {
  readonly category = 'Failure';

  constructor(message = 'Resource not found') {
    super(message);
  }
}

export class IncorrectPasswordError extends AccountError {
  readonly category = 'Failure';

  constructor(message = 'Password is incorrect') {
    super(message);
  }
}

export class UnauthorizedError extends AccountError {
  readonly category = 'Error';

  constructor(readonly reason: DenialReason) {
    super(reason === 'bad token' ? 'Failed to validate token' : `Invalid token: ${reason}`);
  }
}

export class ConflictError extends AccountError {
  readonly category = 'Error';

  constructor(message = 'Conflict') {
    super(message);
  }
}
