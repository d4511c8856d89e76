/**
 * OAuth Flow Errors
 *
 * Every failure of the login flow is one of these types. None of them is
 * fatal to the process, and none carries an access token in its message.
 */

export type AuthErrorCode =
  | 'configuration_error'
  | 'invalid_state'
  | 'exchange_error'
  | 'fetch_error'
  | 'authentication_required';

/**
 * Base class for all login-flow errors
 */
export abstract class AuthFlowError extends Error {
  abstract readonly code: AuthErrorCode;
}

/**
 * Thrown when GitHub OAuth credentials are missing or invalid
 */
export class ConfigurationError extends AuthFlowError {
  readonly code = 'configuration_error';

  constructor(message: string, public readonly missing: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    Error.captureStackTrace(this, ConfigurationError);
  }
}

/**
 * Thrown when a callback's state token is unknown, already used, or expired
 */
export class InvalidStateError extends AuthFlowError {
  readonly code = 'invalid_state';

  constructor(message: string = 'The authentication state is invalid or has expired. Please restart the login.') {
    super(message);
    this.name = 'InvalidStateError';
    Error.captureStackTrace(this, InvalidStateError);
  }
}

/**
 * Thrown when the provider's token endpoint cannot be used to exchange a code
 */
export class ExchangeError extends AuthFlowError {
  readonly code = 'exchange_error';

  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = 'ExchangeError';
    Error.captureStackTrace(this, ExchangeError);
  }
}

/**
 * Thrown when the provider's identity endpoint fails
 */
export class FetchError extends AuthFlowError {
  readonly code = 'fetch_error';

  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = 'FetchError';
    Error.captureStackTrace(this, FetchError);
  }
}

/**
 * Thrown by the auth guard when no user is logged in
 */
export class AuthenticationRequiredError extends AuthFlowError {
  readonly code = 'authentication_required';

  constructor(message: string = "Authentication required. Please login with GitHub first using the 'github_login' tool.") {
    super(message);
    this.name = 'AuthenticationRequiredError';
    Error.captureStackTrace(this, AuthenticationRequiredError);
  }
}

/**
 * HTTP status a web route should answer with for a flow error
 */
export function httpStatusForError(error: unknown): number {
  if (!(error instanceof AuthFlowError)) {
    return 500;
  }
  switch (error.code) {
    case 'invalid_state':
      return 400;
    case 'authentication_required':
      return 401;
    case 'exchange_error':
    case 'fetch_error':
      return 502;
    case 'configuration_error':
      return 500;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
