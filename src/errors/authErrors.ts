// src/errors/authErrors.ts

/**
 * Base class for failures of the authentication subsystem.
 * The error handler turns these into `{ error: code, message }` responses.
 */
export class AuthError extends Error {
  /** HTTP status code */
  readonly status: number;

  /** Stable code for clients, e.g. "WEAK_CREDENTIAL" */
  readonly code: string;

  constructor(status: number, code: string, message: string) {
    super(message);
    this.name = 'AuthError';
    this.status = status;
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): { error: string; message: string } {
    return { error: this.code, message: this.message };
  }
}

/** 400: password below the minimum length */
export class WeakCredentialError extends AuthError {
  constructor(message: string = 'Password must be at least 8 characters long.') {
    super(400, 'WEAK_CREDENTIAL', message);
    this.name = 'WeakCredentialError';
  }
}

/** 400: email or password absent */
export class MissingCredentialsError extends AuthError {
  constructor(message: string = 'Email and password are required.') {
    super(400, 'MISSING_CREDENTIALS', message);
    this.name = 'MissingCredentialsError';
  }
}

/** 400: malformed registration fields (email format, role) */
export class InvalidInputError extends AuthError {
  constructor(message: string) {
    super(400, 'INVALID_INPUT', message);
    this.name = 'InvalidInputError';
  }
}

/** 409: a user with this email already exists */
export class DuplicateIdentityError extends AuthError {
  constructor(message: string = 'User with this email already exists. Try another one.') {
    super(409, 'DUPLICATE_IDENTITY', message);
    this.name = 'DuplicateIdentityError';
  }
}

/** 401: no user matches the supplied email or token subject */
export class UnknownIdentityError extends AuthError {
  constructor(message: string = 'No user found for the supplied identity.') {
    super(401, 'UNKNOWN_IDENTITY', message);
    this.name = 'UnknownIdentityError';
  }
}

/** 401: password does not match the stored hash */
export class InvalidCredentialsError extends AuthError {
  constructor(message: string = 'Incorrect email or password.') {
    super(401, 'INVALID_CREDENTIALS', message);
    this.name = 'InvalidCredentialsError';
  }
}

/** 401: token is malformed, unverifiable, expired or bound to another user */
export class InvalidTokenError extends AuthError {
  constructor(message: string = 'Invalid token.') {
    super(401, 'INVALID_TOKEN', message);
    this.name = 'InvalidTokenError';
  }
}

/** 403: refresh attempted without a refresh_token cookie */
export class RefreshDeniedError extends AuthError {
  constructor(message: string = 'Refresh token cookie is missing.') {
    super(403, 'REFRESH_DENIED', message);
    this.name = 'RefreshDeniedError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
