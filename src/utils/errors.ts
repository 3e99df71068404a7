// Utilities: Custom error types

/**
 * Expected authentication outcome that callers may translate into a response
 */
export class AuthError extends Error {
  statusCode: number;

  constructor(
    message: string,
    public readonly code: string,
    statusCode = 400
  ) {
    super(message);
    this.name = 'AuthError';
    this.statusCode = statusCode;
  }
}

/**
 * The shared session datastore or the credential file could not be read or
 * written. Fatal for the current request: protected content must not render.
 */
export class StoreUnavailableError extends Error {
  statusCode = 503;
  code = 'AUTH_STORE_UNAVAILABLE';
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'StoreUnavailableError';
    this.details = details;
  }
}

/**
 * Identity state machine was driven through a transition it does not allow
 */
export class IdentityStateError extends Error {
  statusCode = 500;
  code = 'IDENTITY_STATE_ERROR';
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'IdentityStateError';
    this.details = details;
  }
}

export const STORE_UNAVAILABLE_MESSAGE = 'authentication subsystem unavailable';
