export class AppError extends Error {
  public statusCode: number;
  public code: string;
  public isOperational: boolean;

  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = true;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'INVALID_INPUT');
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found') {
    super(message, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'No valid authorization token provided', code: string = 'AUTH_REQUIRED') {
    super(message, 401, code);
    this.name = 'UnauthorizedError';
  }
}

export class AccountInactiveError extends AppError {
  constructor(message: string = 'Account is inactive') {
    super(message, 409, 'ACCOUNT_INACTIVE');
    this.name = 'AccountInactiveError';
  }
}

/** Missing or malformed startup configuration. Fatal: the process must not start. */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
    this.isOperational = false;
  }
}

export class CryptoError extends AppError {
  constructor(message: string = 'Unable to decrypt stored credential') {
    super(message, 500, 'CREDENTIAL_DECRYPT_FAILED');
    this.name = 'CryptoError';
  }
}

/**
 * Portal login or identity lookup failed. The caller may retry authenticate.
 * Answers 422; 401 stays reserved for a refused operator token.
 */
export class AuthError extends AppError {
  constructor(message: string) {
    super(message, 422, 'PORTAL_AUTH_FAILED');
    this.name = 'AuthError';
  }
}

/** A portal call was issued before the session reached the required state. */
export class NotAuthenticatedError extends AppError {
  constructor(message: string = 'Not authenticated') {
    super(message, 409, 'PORTAL_NOT_AUTHENTICATED');
    this.name = 'NotAuthenticatedError';
  }
}

export type PortalErrorKind = 'transport' | 'upstream';

export class PortalError extends AppError {
  public readonly kind: PortalErrorKind;
  public readonly httpStatus?: number;

  constructor(kind: PortalErrorKind, message: string, httpStatus?: number) {
    super(message, 502, kind === 'transport' ? 'PORTAL_UNAVAILABLE' : 'PORTAL_REJECTED');
    this.name = 'PortalError';
    this.kind = kind;
    this.httpStatus = httpStatus;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
